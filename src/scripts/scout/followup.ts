import 'reflect-metadata';
import { Logger } from '@nestjs/common';

import { OutreachService } from '@/modules/outreach/application/services/outreach.service';
import { hasFlag, intOption, runScript, withScoutContext } from '@/scripts/script-context';
import { logOutreachReport } from '@/scripts/scout/outreach-summary';

const logger = new Logger('Followup');

runScript(logger, async () => {
  const args = process.argv.slice(2);
  const days = intOption(args, '--days', 5);
  const dryRun = hasFlag(args, '--dry-run');

  logger.log(`🚀 Drafting day-${days} follow-ups${dryRun ? ' (dry-run)' : ''}...`);
  const report = await withScoutContext(logger, (ctx) => ctx.get(OutreachService).followup({ days, dryRun }), {
    dryRun,
  });
  logOutreachReport(logger, report);
});
