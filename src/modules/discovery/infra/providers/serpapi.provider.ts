import { Inject, Injectable, Logger } from '@nestjs/common';
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

const QUERY_TEMPLATES = [
  'Private school',
  'Catholic school',
  'Christian school',
  'Montessori',
  'College prep',
];

/** Google Maps results through SerpAPI: one request per query template. */
@Injectable()
export class SerpApiProvider implements SearchProvider {
  readonly name = 'serpapi';
  private readonly endpoint = 'https://serpapi.com/search.json';
  private readonly logger = new Logger(SerpApiProvider.name);

  constructor(
    private readonly http: HttpService,
    @Inject(scoutConfig.KEY) private readonly config: ScoutConfig,
  ) {}

  async discover(city: string, max: number): Promise<DiscoveryBatch> {
    const apiKey = this.config.serpApiKey;
    if (!apiKey) throw new ProviderUnavailableError(this.name, 'SERPAPI_API_KEY is not configured');

    const normalizedCity = city.replace(/,/g, '').trim();
    const collector = new CandidateCollector(max);

    for (const template of QUERY_TEMPLATES) {
      if (collector.full) break;
      const query = `${template} ${normalizedCity}`;

      for (const item of await this.search(query, apiKey)) {
        const result = asRecord(item);
        const name = str(result.title) ?? str(result.name);
        if (!name) {
          this.logger.log(`[DISCOVER] query='${query}' rejected: missing school name`);
          continue;
        }

        const website = str(result.website) ?? str(asRecord(result.links).website);
        const extras: Record<string, string> = { city, source_query: query };
        const address = str(result.address);
        const phone = str(result.phone);
        if (address) extras.address = address;
        if (phone) extras.phone = phone;

        collector.add(
          { name, website, domain: domainFromUrl(website), provider: this.name, extras },
          query,
        );
        if (collector.full) break;
      }
    }

    return collector.result();
  }

  private async search(query: string, apiKey: string): Promise<unknown[]> {
    try {
      const res = await firstValueFrom(
        this.http.get<unknown>(this.endpoint, {
          params: { engine: 'google_maps', q: query, api_key: apiKey },
        }),
      );
      return asArray(asRecord(res.data).local_results);
    } catch (error) {
      throw new ProviderUnavailableError(this.name, errorMessage(error));
    }
  }
}
