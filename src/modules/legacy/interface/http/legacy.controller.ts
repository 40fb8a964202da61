import { Controller, Post, Query } from '@nestjs/common';

// biome-ignore lint/style/useImportType: NestJS DI needs the runtime reference
import { LegacyViewService } from '@/modules/legacy/application/services/legacy-view.service';

@Controller('legacy')
export class LegacyController {
  constructor(private readonly legacy: LegacyViewService) {}

  @Post('export')
  async export() {
    return this.legacy.exportToFile();
  }

  /**
   * Re-ingests the configured legacy file.
   * Query params:
   * - dryRun (optional): 'true' to report without writing
   */
  @Post('import')
  async import(@Query('dryRun') dryRun?: string) {
    return this.legacy.importFromFile({ dryRun: dryRun === 'true' });
  }
}
