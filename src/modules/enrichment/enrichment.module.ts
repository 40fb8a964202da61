import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';

import { type ScoutConfig, scoutConfig } from '@/config/scout.config';
import { ContentModule } from '@/modules/content/content.module';
import {
  PAGE_FETCHER,
  PLACEHOLDER_PAGE_FETCHER,
} from '@/modules/enrichment/application/ports/page-fetcher.port';
import { EnrichmentService } from '@/modules/enrichment/application/services/enrichment.service';
import { HttpPageFetcher } from '@/modules/enrichment/infra/fetchers/http-page.fetcher';
import { PlaceholderPageFetcher } from '@/modules/enrichment/infra/fetchers/placeholder-page.fetcher';
import { EnrichmentController } from '@/modules/enrichment/interface/http/enrichment.controller';
import { LeadsModule } from '@/modules/leads/leads.module';
import { LegacyModule } from '@/modules/legacy/legacy.module';

@Module({
  imports: [
    LeadsModule,
    LegacyModule,
    ContentModule,
    HttpModule.registerAsync({
      inject: [scoutConfig.KEY],
      useFactory: (config: ScoutConfig) => ({
        timeout: config.fetchTimeoutMs,
        maxRedirects: 5,
        headers: { 'User-Agent': 'school-scout/0.1' },
      }),
    }),
  ],
  providers: [
    { provide: PAGE_FETCHER, useClass: HttpPageFetcher },
    { provide: PLACEHOLDER_PAGE_FETCHER, useClass: PlaceholderPageFetcher },
    EnrichmentService,
  ],
  controllers: [EnrichmentController],
  exports: [EnrichmentService],
})
export class EnrichmentModule {}
