/** Column set of the legacy `leads.csv`, in file order. */
export const LEGACY_COLUMNS = [
  'lead_id',
  'school_name',
  'city',
  'website',
  'domain',
  'provider',
  'contact_email',
  'contact_role',
  'all_emails',
  'primary_contact',
  'linkedin_url',
  'contact_method',
  'contact_score',
  'contact_priority_label',
  'contact_form_url',
  'contact_page',
  'about_page',
  'personalization_hook',
  'enriched_at',
  'email1_path',
  'followup_path',
  'brief_path',
  'notes',
] as const;

export type LegacyColumn = (typeof LEGACY_COLUMNS)[number];

export type LegacyRow = Record<LegacyColumn, string>;

/** Separator of addresses inside the `all_emails` cell. */
export const EMAIL_LIST_SEPARATOR = ';';

export function isLegacyColumn(value: string): value is LegacyColumn {
  return (LEGACY_COLUMNS as readonly string[]).includes(value);
}
