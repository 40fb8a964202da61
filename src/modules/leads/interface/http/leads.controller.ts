import { Controller, Get, NotFoundException, Param, Query } from '@nestjs/common';

// biome-ignore lint/style/useImportType: NestJS DI needs the runtime reference
import { ArtifactLedgerService } from '@/modules/leads/application/services/artifact-ledger.service';
// biome-ignore lint/style/useImportType: NestJS DI needs the runtime reference
import { LeadsStoreService } from '@/modules/leads/application/services/leads-store.service';

@Controller('leads')
export class LeadsController {
  constructor(
    private readonly store: LeadsStoreService,
    private readonly ledger: ArtifactLedgerService,
  ) {}

  /**
   * Query params:
   * - domain (optional): return only the lead that owns this domain
   */
  @Get()
  async list(@Query('domain') domain?: string) {
    if (!domain) return this.store.listAll();

    const lead = await this.store.findByDomain(domain);
    if (!lead) throw new NotFoundException(`No lead owns domain ${domain}`);
    return [lead];
  }

  @Get(':id')
  async get(@Param('id') id: string) {
    return this.store.get(id);
  }

  @Get(':id/artifacts')
  async artifacts(@Param('id') id: string) {
    return this.ledger.entries(id);
  }
}
