import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { scoutConfig } from '@/config/scout.config';
import { ContentModule } from '@/modules/content/content.module';
import { DiscoveryModule } from '@/modules/discovery/discovery.module';
import { EnrichmentModule } from '@/modules/enrichment/enrichment.module';
import { LeadsModule } from '@/modules/leads/leads.module';
import { LegacyModule } from '@/modules/legacy/legacy.module';
import { OutreachModule } from '@/modules/outreach/outreach.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [scoutConfig] }),
    LeadsModule,
    LegacyModule,
    ContentModule,
    DiscoveryModule,
    EnrichmentModule,
    OutreachModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
