import { Controller, DefaultValuePipe, Param, ParseBoolPipe, ParseIntPipe, Post, Query } from '@nestjs/common';

// biome-ignore lint/style/useImportType: NestJS DI needs the runtime reference
import { OutreachService } from '@/modules/outreach/application/services/outreach.service';
import type { OutreachReport } from '@/modules/outreach/domain/outreach-report';

@Controller('outreach')
export class OutreachController {
  constructor(private readonly outreach: OutreachService) {}

  @Post('drafts')
  draft(
    @Query('limit', new DefaultValuePipe(10), ParseIntPipe) limit: number,
    @Query('dryRun', new DefaultValuePipe(false), ParseBoolPipe) dryRun: boolean,
  ): Promise<OutreachReport> {
    return this.outreach.draft({ limit, dryRun });
  }

  @Post('followups')
  followup(
    @Query('days', new DefaultValuePipe(5), ParseIntPipe) days: number,
    @Query('dryRun', new DefaultValuePipe(false), ParseBoolPipe) dryRun: boolean,
  ): Promise<OutreachReport> {
    return this.outreach.followup({ days, dryRun });
  }

  @Post('briefs/:leadId')
  brief(
    @Param('leadId') leadId: string,
    @Query('dryRun', new DefaultValuePipe(false), ParseBoolPipe) dryRun: boolean,
  ): Promise<OutreachReport> {
    return this.outreach.brief({ leadId, dryRun });
  }
}
