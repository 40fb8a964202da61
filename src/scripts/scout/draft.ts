import 'reflect-metadata';
import { Logger } from '@nestjs/common';

import { OutreachService } from '@/modules/outreach/application/services/outreach.service';
import { hasFlag, intOption, runScript, withScoutContext } from '@/scripts/script-context';
import { logOutreachReport } from '@/scripts/scout/outreach-summary';

const logger = new Logger('Draft');

runScript(logger, async () => {
  const args = process.argv.slice(2);
  const limit = intOption(args, '--limit', 10);
  const dryRun = hasFlag(args, '--dry-run');

  logger.log(`🚀 Drafting first messages for up to ${limit} leads${dryRun ? ' (dry-run)' : ''}...`);
  const report = await withScoutContext(logger, (ctx) => ctx.get(OutreachService).draft({ limit, dryRun }), {
    dryRun,
  });
  logOutreachReport(logger, report);
});
