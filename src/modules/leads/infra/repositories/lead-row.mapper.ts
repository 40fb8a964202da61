import type { Lead } from '@/modules/leads/domain/lead';

/** Column layout shared by the SQLite and Supabase `leads` tables. */
export type LeadRow = {
  lead_id: string;
  name: string | null;
  website: string | null;
  domain: string | null;
  provider: string | null;
  contact_email: string | null;
  contact_role: string | null;
  all_emails: string | null;
  primary_contact: string | null;
  linkedin_url: string | null;
  contact_method: string | null;
  contact_score: number | null;
  contact_priority_label: string | null;
  contact_form_url: string | null;
  contact_page: string | null;
  about_page: string | null;
  personalization_hook: string | null;
  enriched_at: string | null;
  email1_path: string | null;
  followup_path: string | null;
  brief_path: string | null;
  notes: string | null;
  extras_json: string | null;
  updated_at: string;
};

export const LEAD_COLUMNS = [
  'lead_id',
  'name',
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
  'extras_json',
  'updated_at',
] as const satisfies ReadonlyArray<keyof LeadRow>;

function parseStringArray(raw: string | null): string[] {
  if (!raw) return [];
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : [];
}

function parseStringRecord(raw: string | null): Record<string, string> {
  if (!raw) return {};
  const parsed: unknown = JSON.parse(raw);
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) return {};

  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string') out[key] = value;
  }
  return out;
}

/** Sorted keys so the serialized column is stable across writes. */
function stringifyRecord(record: Record<string, string>): string {
  const sorted = Object.keys(record)
    .sort()
    .map((key) => [key, record[key]]);
  return JSON.stringify(Object.fromEntries(sorted));
}

export function rowToLead(row: LeadRow): Lead {
  return {
    lead_id: row.lead_id,
    name: row.name,
    website: row.website,
    domain: row.domain,
    provider: row.provider,
    contact_email: row.contact_email,
    contact_role: row.contact_role,
    all_emails: parseStringArray(row.all_emails),
    primary_contact: row.primary_contact,
    linkedin_url: row.linkedin_url,
    contact_method: row.contact_method,
    contact_score: row.contact_score,
    contact_priority_label: row.contact_priority_label,
    contact_form_url: row.contact_form_url,
    contact_page: row.contact_page,
    about_page: row.about_page,
    personalization_hook: row.personalization_hook,
    enriched_at: row.enriched_at,
    email1_path: row.email1_path,
    followup_path: row.followup_path,
    brief_path: row.brief_path,
    notes: row.notes,
    extras: parseStringRecord(row.extras_json),
  };
}

export function leadToRow(lead: Lead, updatedAt: string): LeadRow {
  return {
    lead_id: lead.lead_id,
    name: lead.name,
    website: lead.website,
    domain: lead.domain,
    provider: lead.provider,
    contact_email: lead.contact_email,
    contact_role: lead.contact_role,
    all_emails: JSON.stringify(lead.all_emails),
    primary_contact: lead.primary_contact,
    linkedin_url: lead.linkedin_url,
    contact_method: lead.contact_method,
    contact_score: lead.contact_score,
    contact_priority_label: lead.contact_priority_label,
    contact_form_url: lead.contact_form_url,
    contact_page: lead.contact_page,
    about_page: lead.about_page,
    personalization_hook: lead.personalization_hook,
    enriched_at: lead.enriched_at,
    email1_path: lead.email1_path,
    followup_path: lead.followup_path,
    brief_path: lead.brief_path,
    notes: lead.notes,
    extras_json: stringifyRecord(lead.extras),
    updated_at: updatedAt,
  };
}
