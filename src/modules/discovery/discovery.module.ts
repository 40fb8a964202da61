import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';

import { type ScoutConfig, scoutConfig } from '@/config/scout.config';
import { SEARCH_PROVIDERS, type SearchProvider } from '@/modules/discovery/application/ports/search-provider.port';
import { DiscoveryService } from '@/modules/discovery/application/services/discovery.service';
import { BraveProvider } from '@/modules/discovery/infra/providers/brave.provider';
import { SerpApiProvider } from '@/modules/discovery/infra/providers/serpapi.provider';
import { DiscoveryController } from '@/modules/discovery/interface/http/discovery.controller';
import { LeadsModule } from '@/modules/leads/leads.module';
import { LegacyModule } from '@/modules/legacy/legacy.module';

@Module({
  imports: [
    LeadsModule,
    LegacyModule,
    HttpModule.registerAsync({
      inject: [scoutConfig.KEY],
      useFactory: (config: ScoutConfig) => ({
        timeout: config.fetchTimeoutMs,
        headers: { 'User-Agent': 'school-scout/0.1' },
      }),
    }),
  ],
  providers: [
    SerpApiProvider,
    BraveProvider,
    {
      provide: SEARCH_PROVIDERS,
      inject: [SerpApiProvider, BraveProvider],
      useFactory: (...providers: SearchProvider[]) => providers,
    },
    DiscoveryService,
  ],
  controllers: [DiscoveryController],
  exports: [DiscoveryService],
})
export class DiscoveryModule {}
