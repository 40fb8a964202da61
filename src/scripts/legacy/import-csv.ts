import 'reflect-metadata';
import { Logger } from '@nestjs/common';

import { LegacyViewService } from '@/modules/legacy/application/services/legacy-view.service';
import { hasFlag, optionValue, RULE, runScript, withScoutContext } from '@/scripts/script-context';

const logger = new Logger('LegacyImport');

runScript(logger, async () => {
  const args = process.argv.slice(2);
  const path = optionValue(args, '--input');
  const dryRun = hasFlag(args, '--dry-run');

  logger.log(`🚀 Importing legacy sheet ${path ?? '(configured path)'}${dryRun ? ' (dry-run)' : ''}...`);

  const report = await withScoutContext(
    logger,
    (ctx) => ctx.get(LegacyViewService).importFromFile({ path, dryRun }),
    { seed: false },
  );

  logger.log(RULE);
  logger.log(`✅ ${report.file.name} (${report.file.rows} rows, sha256 ${report.file.hash.slice(0, 12)})`);
  logger.log(`   Processed: ${report.totals.processed}`);
  logger.log(`   Created: ${report.totals.created}`);
  logger.log(`   Updated: ${report.totals.updated}`);
  logger.log(`   Unchanged: ${report.totals.unchanged}`);
  if (report.errors.length > 0) {
    logger.warn(`⚠️  Unresolvable rows: ${report.errors.length}`);
    for (const error of report.errors) {
      logger.warn(`   row ${error.row}: ${error.reason}`);
    }
  }
  logger.log(RULE);
});
