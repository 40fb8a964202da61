import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  SEARCH_PROVIDERS,
  type SearchProvider,
} from '@/modules/discovery/application/ports/search-provider.port';
import type { DiscoveryRejection } from '@/modules/discovery/domain/candidate';
import {
  type ConsolidationReport,
  LeadsConsolidationService,
} from '@/modules/leads/application/services/leads-consolidation.service';
import { ProviderUnavailableError } from '@/modules/leads/domain/errors';
import { LegacyViewService } from '@/modules/legacy/application/services/legacy-view.service';

export interface DiscoveryParams {
  city: string;
  max: number;
  provider: string;
}

export interface DiscoveryReport {
  provider: string;
  city: string;
  found: number;
  rejected: DiscoveryRejection[];
  consolidation: ConsolidationReport;
  exportPath: string;
}

@Injectable()
export class DiscoveryService {
  private readonly logger = new Logger(DiscoveryService.name);

  constructor(
    @Inject(SEARCH_PROVIDERS) private readonly providers: SearchProvider[],
    private readonly consolidation: LeadsConsolidationService,
    private readonly legacy: LegacyViewService,
  ) {}

  provider(name: string): SearchProvider {
    const normalized = name.trim().toLowerCase();
    const provider = this.providers.find((p) => p.name === normalized);
    if (!provider) {
      const known = this.providers.map((p) => p.name).join(', ');
      throw new ProviderUnavailableError(name, `unsupported provider (known: ${known})`);
    }
    return provider;
  }

  async run({ city, max, provider: providerName }: DiscoveryParams): Promise<DiscoveryReport> {
    const provider = this.provider(providerName);
    this.logger.log(`Discovering up to ${max} schools in ${city} via ${provider.name}`);

    const batch = await provider.discover(city, max);
    const consolidation = await this.consolidation.consolidate(
      batch.candidates.map((c) => ({
        name: c.name,
        website: c.website,
        domain: c.domain,
        provider: c.provider,
        extras: c.extras,
      })),
    );
    const exported = await this.legacy.exportToFile();

    return {
      provider: provider.name,
      city,
      found: batch.candidates.length,
      rejected: batch.rejected,
      consolidation,
      exportPath: exported.path,
    };
  }
}
