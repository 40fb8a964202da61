import { Injectable } from '@nestjs/common';

import {
  ARTIFACT_PATH_FIELDS,
  IDENTITY_FIELDS,
  type Lead,
  type LeadField,
  type LeadTextField,
  type LeadUpdate,
  TEXT_FIELDS,
} from '@/modules/leads/domain/lead';
import {
  cleanText,
  domainFromUrl,
  normalizeEmail,
} from '@/modules/leads/application/utils/normalize';

export interface MergeOptions {
  /** Lets a new artifact path replace a recorded one (explicit regeneration). */
  overwriteArtifacts?: boolean;
}

export interface MergeResult {
  lead: Lead;
  changed: LeadField[];
  /** Incoming values refused because they contradict the lead's identity. */
  rejected: LeadField[];
}

const FILL_ONLY = new Set<LeadTextField>(IDENTITY_FIELDS);
const ARTIFACT_FIELDS = new Set<LeadTextField>(ARTIFACT_PATH_FIELDS);

/**
 * Applies a partial update onto a lead without ever clearing a populated
 * field. Used for fresh inserts (onto an empty lead), enrichment, legacy
 * re-import and dry-run previews alike.
 */
@Injectable()
export class LeadMergerService {
  merge(existing: Lead, updates: LeadUpdate, options: MergeOptions = {}): MergeResult {
    const lead: Lead = {
      ...existing,
      all_emails: [...existing.all_emails],
      extras: { ...existing.extras },
    };
    const changed: LeadField[] = [];
    const rejected: LeadField[] = [];
    // domain is fill-only, so the website must keep deriving to it
    const identity = lead.domain ?? domainFromUrl(cleanText(updates.domain));

    for (const field of TEXT_FIELDS) {
      if (field === 'enriched_at') continue;

      const raw = cleanText(updates[field]);
      const incoming = field === 'domain' ? domainFromUrl(raw) : raw;
      if (incoming === null || incoming === lead[field]) continue;

      if (field === 'website' && identity !== null) {
        const derived = domainFromUrl(incoming);
        if (derived !== null && derived !== identity) {
          rejected.push(field);
          continue;
        }
      }

      const current = lead[field];
      if (current !== null) {
        if (FILL_ONLY.has(field)) continue;
        if (ARTIFACT_FIELDS.has(field) && !options.overwriteArtifacts) continue;
      }

      lead[field] = incoming;
      changed.push(field);
    }

    if (lead.domain === null) {
      const derived = domainFromUrl(lead.website);
      if (derived) {
        lead.domain = derived;
        changed.push('domain');
      }
    }

    const score = updates.contact_score;
    if (typeof score === 'number' && Number.isFinite(score) && score !== lead.contact_score) {
      lead.contact_score = score;
      changed.push('contact_score');
    }

    if (this.mergeEmails(lead, updates.all_emails ?? [])) {
      changed.push('all_emails');
    }

    if (this.mergeExtras(lead, updates.extras ?? {})) {
      changed.push('extras');
    }

    const stamp = cleanText(updates.enriched_at);
    if (changed.length > 0 && stamp !== null && (lead.enriched_at === null || stamp > lead.enriched_at)) {
      lead.enriched_at = stamp;
      changed.push('enriched_at');
    }

    return { lead, changed, rejected };
  }

  /** Case-insensitive union, first-seen order. Returns true when an address was added. */
  private mergeEmails(lead: Lead, incoming: readonly string[]): boolean {
    const seen = new Set(lead.all_emails.map((e) => e.toLowerCase()));
    let added = false;

    for (const raw of incoming) {
      const email = normalizeEmail(raw);
      if (!email || seen.has(email)) continue;
      seen.add(email);
      lead.all_emails.push(email);
      added = true;
    }
    return added;
  }

  private mergeExtras(lead: Lead, incoming: Record<string, string>): boolean {
    let touched = false;
    for (const [key, raw] of Object.entries(incoming)) {
      const value = cleanText(raw);
      if (value === null || lead.extras[key] === value) continue;
      lead.extras[key] = value;
      touched = true;
    }
    return touched;
  }
}
