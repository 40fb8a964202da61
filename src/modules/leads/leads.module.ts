import { Module } from '@nestjs/common';

import { ArtifactLedgerService } from '@/modules/leads/application/services/artifact-ledger.service';
import { IdentityResolverService } from '@/modules/leads/application/services/identity-resolver.service';
import { LeadMergerService } from '@/modules/leads/application/services/lead-merger.service';
import { LeadsConsolidationService } from '@/modules/leads/application/services/leads-consolidation.service';
import { LeadsStoreService } from '@/modules/leads/application/services/leads-store.service';
import { leadsRepositoryProvider } from '@/modules/leads/infra/repositories/leads-repository.provider';
import { LeadsController } from '@/modules/leads/interface/http/leads.controller';

@Module({
  providers: [
    LeadMergerService,
    IdentityResolverService,
    LeadsStoreService,
    ArtifactLedgerService,
    LeadsConsolidationService,
    leadsRepositoryProvider,
  ],
  controllers: [LeadsController],
  exports: [
    LeadMergerService,
    IdentityResolverService,
    LeadsStoreService,
    ArtifactLedgerService,
    LeadsConsolidationService,
  ],
})
export class LeadsModule {}
