import { Controller, DefaultValuePipe, ParseBoolPipe, Post, Query } from '@nestjs/common';

// biome-ignore lint/style/useImportType: NestJS DI needs the runtime reference
import { EnrichmentService } from '@/modules/enrichment/application/services/enrichment.service';

@Controller('enrichment')
export class EnrichmentController {
  constructor(private readonly enrichment: EnrichmentService) {}

  /**
   * Query params:
   * - dryRun (optional): fetch nothing, write nothing, report would-be changes
   * - leadId (optional, repeatable): restrict the run
   */
  @Post()
  async run(
    @Query('dryRun', new DefaultValuePipe(false), ParseBoolPipe) dryRun: boolean,
    @Query('leadId') leadId?: string | string[],
  ) {
    const leadIds = leadId === undefined ? undefined : Array.isArray(leadId) ? leadId : [leadId];
    return this.enrichment.run({ dryRun, leadIds });
  }
}
