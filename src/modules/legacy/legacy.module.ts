import { Module } from '@nestjs/common';

import { LeadsModule } from '@/modules/leads/leads.module';
import { SPREADSHEET_PARSER } from '@/modules/legacy/application/ports/spreadsheet-parser.port';
import { LegacyViewService } from '@/modules/legacy/application/services/legacy-view.service';
import { SpreadsheetParserService } from '@/modules/legacy/infra/parser/spreadsheet-parser.service';
import { LegacyController } from '@/modules/legacy/interface/http/legacy.controller';

@Module({
  imports: [LeadsModule],
  controllers: [LegacyController],
  providers: [
    LegacyViewService,
    {
      provide: SPREADSHEET_PARSER,
      useClass: SpreadsheetParserService,
    },
  ],
  exports: [LegacyViewService],
})
export class LegacyModule {}
