import type { Lead } from '@/modules/leads/domain/lead';

export type ContentKind =
  | 'personalization_hook'
  | 'email'
  | 'contact_form'
  | 'linkedin'
  | 'followup'
  | 'brief';

export interface ContentRequest {
  kind: ContentKind;
  /** Website text the hook is grounded on. */
  pageText?: string;
  /** Days since the first message, for follow-ups. */
  days?: number;
}

export const CONTENT_GENERATOR = Symbol('CONTENT_GENERATOR');
/** Deterministic generator used by dry-runs; never calls out. */
export const PLACEHOLDER_CONTENT_GENERATOR = Symbol('PLACEHOLDER_CONTENT_GENERATOR');

export interface ContentGenerator {
  generate(lead: Lead, request: ContentRequest): Promise<string>;
}
