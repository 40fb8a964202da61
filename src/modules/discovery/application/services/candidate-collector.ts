import { Logger } from '@nestjs/common';

import { isBlockedDomain } from '@/modules/discovery/domain/blocked-domains';
import type { DiscoveryCandidate } from '@/modules/discovery/domain/candidate';
import type { DiscoveryBatch } from '@/modules/discovery/application/ports/search-provider.port';

/**
 * Accumulates one provider's results up to `max`, dropping directory sites
 * and repeats of a domain or exact name already seen in the same search.
 */
export class CandidateCollector {
  private readonly logger = new Logger('Discover');
  private readonly batch: DiscoveryBatch = { candidates: [], rejected: [] };
  private readonly seenDomains = new Set<string>();
  private readonly seenNames = new Set<string>();

  constructor(private readonly max: number) {}

  get full(): boolean {
    return this.batch.candidates.length >= this.max;
  }

  add(candidate: DiscoveryCandidate, query: string | null): boolean {
    if (this.full) return false;

    const { name, domain } = candidate;
    const normalizedName = name.toLowerCase().trim();
    const reject = (reason: 'blocked_domain' | 'duplicate_domain' | 'duplicate_name') => {
      this.logger.log(`[DISCOVER] query='${query ?? ''}' rejected: ${name} (${domain ?? 'none'}) ${reason}`);
      this.batch.rejected.push({ name, domain, query, reason });
      return false;
    };

    if (isBlockedDomain(domain)) return reject('blocked_domain');
    if (domain && this.seenDomains.has(domain)) return reject('duplicate_domain');
    if (this.seenNames.has(normalizedName)) return reject('duplicate_name');

    if (domain) this.seenDomains.add(domain);
    this.seenNames.add(normalizedName);
    this.batch.candidates.push(candidate);
    this.logger.log(
      `[DISCOVER] query='${query ?? ''}' accepted: ${name} (domain=${domain ?? 'none'}, website=${candidate.website ?? 'none'})`,
    );
    return true;
  }

  result(): DiscoveryBatch {
    return this.batch;
  }
}
