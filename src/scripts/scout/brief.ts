import 'reflect-metadata';
import { Logger } from '@nestjs/common';

import { OutreachService } from '@/modules/outreach/application/services/outreach.service';
import { hasFlag, optionValue, runScript, withScoutContext } from '@/scripts/script-context';
import { logOutreachReport } from '@/scripts/scout/outreach-summary';

const logger = new Logger('Brief');

runScript(logger, async () => {
  const args = process.argv.slice(2);
  const leadId = optionValue(args, '--lead-id')?.trim();
  if (!leadId) throw new Error('--lead-id is required');
  const dryRun = hasFlag(args, '--dry-run');

  logger.log(`🚀 Writing call brief for ${leadId}${dryRun ? ' (dry-run)' : ''}...`);
  const report = await withScoutContext(logger, (ctx) => ctx.get(OutreachService).brief({ leadId, dryRun }), {
    dryRun,
  });
  logOutreachReport(logger, report);
});
