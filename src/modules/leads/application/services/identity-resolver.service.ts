import { Inject, Injectable } from '@nestjs/common';

import { type ScoutConfig, scoutConfig } from '@/config/scout.config';
import { AmbiguousMergeError } from '@/modules/leads/domain/errors';
import type { Lead } from '@/modules/leads/domain/lead';
import { nameSimilarity } from '@/modules/leads/application/utils/name-similarity';
import {
  cleanText,
  domainFromUrl,
  normalizeKey,
} from '@/modules/leads/application/utils/normalize';

export interface LeadCandidate {
  name?: string | null;
  domain?: string | null;
  website?: string | null;
  extras?: Record<string, string>;
}

export type MatchRule = 'domain' | 'fuzzy_name';

export type Resolution =
  | { kind: 'match'; leadId: string; rule: MatchRule; similarity: number }
  | { kind: 'new' };

function cityOf(extras: Record<string, string> | undefined): string | null {
  const city = cleanText(extras?.city);
  return city === null ? null : normalizeKey(city) || null;
}

/**
 * Decides whether an incoming candidate is an existing canonical lead.
 * Pure: the caller owns the upsert.
 */
@Injectable()
export class IdentityResolverService {
  private readonly threshold: number;

  constructor(@Inject(scoutConfig.KEY) config: ScoutConfig) {
    this.threshold = config.nameMatchThreshold;
  }

  resolve(candidate: LeadCandidate, existing: readonly Lead[]): Resolution {
    const domain = domainFromUrl(cleanText(candidate.domain)) ?? domainFromUrl(candidate.website);

    if (domain) {
      const owner = existing.find((lead) => lead.domain === domain);
      if (owner) return { kind: 'match', leadId: owner.lead_id, rule: 'domain', similarity: 1 };
    }

    const city = cityOf(candidate.extras);
    let best: { leadId: string; similarity: number } | null = null;

    for (const lead of existing) {
      // Different sites are different organizations, however alike the names.
      if (domain && lead.domain && lead.domain !== domain) continue;

      const leadCity = cityOf(lead.extras);
      if (city && leadCity && city !== leadCity) continue;

      const similarity = nameSimilarity(candidate.name, lead.name);
      if (similarity === 0 || similarity < this.threshold) continue;

      if (
        !best ||
        similarity > best.similarity ||
        (similarity === best.similarity && lead.lead_id < best.leadId)
      ) {
        best = { leadId: lead.lead_id, similarity };
      }
    }

    return best
      ? { kind: 'match', leadId: best.leadId, rule: 'fuzzy_name', similarity: best.similarity }
      : { kind: 'new' };
  }

  /** Canonical leads are never folded into each other automatically. */
  mergeCanonical(leftId: string, rightId: string): never {
    throw new AmbiguousMergeError([leftId, rightId]);
  }
}
