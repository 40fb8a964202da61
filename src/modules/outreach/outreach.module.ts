import { Module } from '@nestjs/common';

import { ContentModule } from '@/modules/content/content.module';
import { LeadsModule } from '@/modules/leads/leads.module';
import { LegacyModule } from '@/modules/legacy/legacy.module';
import { ARTIFACT_WRITER } from '@/modules/outreach/application/ports/artifact-writer.port';
import { OutreachService } from '@/modules/outreach/application/services/outreach.service';
import { MarkdownFileWriter } from '@/modules/outreach/infra/writers/markdown-file.writer';
import { OutreachController } from '@/modules/outreach/interface/http/outreach.controller';

@Module({
  imports: [LeadsModule, LegacyModule, ContentModule],
  providers: [{ provide: ARTIFACT_WRITER, useClass: MarkdownFileWriter }, OutreachService],
  controllers: [OutreachController],
  exports: [OutreachService],
})
export class OutreachModule {}
