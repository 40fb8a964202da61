import 'reflect-metadata';
import { Logger } from '@nestjs/common';

import { EnrichmentService } from '@/modules/enrichment/application/services/enrichment.service';
import { hasFlag, optionValue, RULE, runScript, withScoutContext } from '@/scripts/script-context';

const logger = new Logger('Enrich');

runScript(logger, async () => {
  const args = process.argv.slice(2);
  const dryRun = hasFlag(args, '--dry-run');
  const leadIds = optionValue(args, '--lead-id')
    ?.split(',')
    .map((id) => id.trim())
    .filter(Boolean);

  logger.log(`🚀 Enriching leads${dryRun ? ' (dry-run)' : ''}...`);

  const report = await withScoutContext(logger, (ctx) => ctx.get(EnrichmentService).run({ dryRun, leadIds }), {
    dryRun,
  });

  logger.log(RULE);
  logger.log(`✅ Processed ${report.processed} leads`);
  logger.log(`   Updated: ${report.updated}`);
  logger.log(`   Unchanged: ${report.unchanged}`);
  for (const change of report.changes) {
    logger.log(`   ${change.leadId}: ${change.changed.join(', ')}`);
  }
  if (report.failed.length > 0) {
    logger.warn(`⚠️  Failed: ${report.failed.length}`);
    for (const failure of report.failed) {
      logger.warn(`   [${failure.kind}] ${failure.leadId}: ${failure.reason}`);
    }
  }
  if (report.exportPath) logger.log(`   Exported to ${report.exportPath}`);
  logger.log(RULE);
});
