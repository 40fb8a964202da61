import { Injectable, Logger } from '@nestjs/common';

import {
  IdentityResolverService,
  type MatchRule,
} from '@/modules/leads/application/services/identity-resolver.service';
import { LeadsStoreService } from '@/modules/leads/application/services/leads-store.service';
import type { Lead, LeadUpdate } from '@/modules/leads/domain/lead';

export interface ConsolidationReport {
  received: number;
  created: number;
  matched: Record<MatchRule, number>;
  leadIds: string[];
}

/**
 * Runs discovered candidates through the identity resolver and into the
 * store, one at a time, so later candidates in a batch see earlier ones.
 */
@Injectable()
export class LeadsConsolidationService {
  private readonly logger = new Logger(LeadsConsolidationService.name);

  constructor(
    private readonly resolver: IdentityResolverService,
    private readonly store: LeadsStoreService,
  ) {}

  async consolidate(candidates: readonly LeadUpdate[]): Promise<ConsolidationReport> {
    const report: ConsolidationReport = {
      received: candidates.length,
      created: 0,
      matched: { domain: 0, fuzzy_name: 0 },
      leadIds: [],
    };

    const known = new Map<string, Lead>((await this.store.listAll()).map((l) => [l.lead_id, l]));

    for (const candidate of candidates) {
      const resolution = this.resolver.resolve(candidate, [...known.values()]);
      const result =
        resolution.kind === 'match'
          ? await this.store.upsert(resolution.leadId, candidate)
          : await this.store.upsert(null, candidate);

      if (resolution.kind === 'match') {
        report.matched[resolution.rule]++;
        this.logger.debug(
          `Candidate "${candidate.name ?? ''}" matched ${resolution.leadId} by ${resolution.rule} (${resolution.similarity.toFixed(2)})`,
        );
      } else {
        report.created++;
      }

      known.set(result.leadId, await this.store.get(result.leadId));
      if (!report.leadIds.includes(result.leadId)) report.leadIds.push(result.leadId);
    }

    await this.store.drain();
    return report;
  }
}
