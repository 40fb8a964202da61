export const TEXT_FIELDS = [
  'name',
  'website',
  'domain',
  'provider',
  'contact_email',
  'contact_role',
  'primary_contact',
  'linkedin_url',
  'contact_method',
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

export type LeadTextField = (typeof TEXT_FIELDS)[number];

/** Identity and provenance: filled once, never overwritten by a merge. */
export const IDENTITY_FIELDS = ['domain', 'provider'] as const satisfies readonly LeadTextField[];

/** Artifact pointers; only the ledger replaces a value already set. */
export const ARTIFACT_PATH_FIELDS = [
  'email1_path',
  'followup_path',
  'brief_path',
] as const satisfies readonly LeadTextField[];

export type ArtifactPathField = (typeof ARTIFACT_PATH_FIELDS)[number];

export type LeadTextFields = { [K in LeadTextField]: string | null };

export interface Lead extends LeadTextFields {
  lead_id: string;
  all_emails: string[];
  contact_score: number | null;
  extras: Record<string, string>;
}

/** Partial field update: what discovery, enrichment and legacy rows produce. */
export type LeadUpdate = Partial<LeadTextFields> & {
  all_emails?: string[];
  contact_score?: number | null;
  extras?: Record<string, string>;
};

export type LeadField = keyof Omit<Lead, 'lead_id'>;

export function emptyLead(leadId: string): Lead {
  return {
    lead_id: leadId,
    name: null,
    website: null,
    domain: null,
    provider: null,
    contact_email: null,
    contact_role: null,
    primary_contact: null,
    linkedin_url: null,
    contact_method: null,
    contact_priority_label: null,
    contact_form_url: null,
    contact_page: null,
    about_page: null,
    personalization_hook: null,
    enriched_at: null,
    email1_path: null,
    followup_path: null,
    brief_path: null,
    notes: null,
    all_emails: [],
    contact_score: null,
    extras: {},
  };
}
