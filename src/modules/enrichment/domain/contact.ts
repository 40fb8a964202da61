export const CONTACT_METHODS = ['email', 'linkedin', 'contact_form', 'phone_only', 'none'] as const;
export type ContactMethod = (typeof CONTACT_METHODS)[number];

export type ContactTier = 'Tier 1' | 'Tier 2' | 'Tier 3' | 'Tier 4' | 'Tier 5';

export interface ContactSignals {
  email: string | null;
  linkedinUrl: string | null;
  contactFormUrl: string | null;
  phone: string | null;
}

export interface ContactClassification {
  method: ContactMethod;
  tier: ContactTier;
  score: number;
}
