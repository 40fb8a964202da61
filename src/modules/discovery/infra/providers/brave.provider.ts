import { Inject, Injectable } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';

import { type ScoutConfig, scoutConfig } from '@/config/scout.config';
import { CandidateCollector } from '@/modules/discovery/application/services/candidate-collector';
import type {
  DiscoveryBatch,
  SearchProvider,
} from '@/modules/discovery/application/ports/search-provider.port';
import { asArray, asRecord, str } from '@/modules/discovery/infra/providers/payload';
import { domainFromUrl } from '@/modules/leads/application/utils/normalize';
import { errorMessage, ProviderUnavailableError } from '@/modules/leads/domain/errors';

const MAX_COUNT = 20;

/** Brave web search; a single query, at most 20 results per call. */
@Injectable()
export class BraveProvider implements SearchProvider {
  readonly name = 'brave';
  private readonly endpoint = 'https://api.search.brave.com/res/v1/web/search';

  constructor(
    private readonly http: HttpService,
    @Inject(scoutConfig.KEY) private readonly config: ScoutConfig,
  ) {}

  async discover(city: string, max: number): Promise<DiscoveryBatch> {
    const apiKey = this.config.braveApiKey;
    if (!apiKey) throw new ProviderUnavailableError(this.name, 'BRAVE_SEARCH_API_KEY is not configured');

    const query = `private K-12 schools in ${city}`;
    let results: unknown[];
    try {
      const res = await firstValueFrom(
        this.http.get<unknown>(this.endpoint, {
          headers: { Accept: 'application/json', 'X-Subscription-Token': apiKey },
          params: { q: query, count: Math.min(max, MAX_COUNT) },
        }),
      );
      results = asArray(asRecord(asRecord(res.data).web).results);
    } catch (error) {
      throw new ProviderUnavailableError(this.name, errorMessage(error));
    }

    const collector = new CandidateCollector(max);
    for (const item of results) {
      const result = asRecord(item);
      const name = str(result.title);
      if (!name) continue;

      const website = str(result.url);
      collector.add(
        {
          name,
          website,
          domain: domainFromUrl(website),
          provider: this.name,
          extras: { city, source_query: query },
        },
        query,
      );
      if (collector.full) break;
    }

    return collector.result();
  }
}
