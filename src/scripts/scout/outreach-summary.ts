import type { Logger } from '@nestjs/common';

import type { OutreachReport } from '@/modules/outreach/domain/outreach-report';
import { RULE } from '@/scripts/script-context';

export function logOutreachReport(logger: Logger, report: OutreachReport): void {
  logger.log(RULE);
  logger.log(`✅ ${report.generated.length} artifacts for ${report.leads} leads${report.dryRun ? ' (dry-run)' : ''}`);
  for (const artifact of report.generated) {
    logger.log(`   ${artifact.leadId} ${artifact.kind} → ${artifact.path}`);
  }
  if (report.regenerated.length > 0) {
    logger.warn(`⚠️  Regenerated ${report.regenerated.length}:`);
    for (const artifact of report.regenerated) {
      logger.warn(`   ${artifact.leadId} ${artifact.kind} replaces ${artifact.previousPath ?? ''}`);
    }
  }
  if (report.failed.length > 0) {
    logger.warn(`⚠️  Failed: ${report.failed.length}`);
    for (const failure of report.failed) {
      logger.warn(`   [${failure.kind}] ${failure.leadId}: ${failure.reason}`);
    }
  }
  logger.log(`   Skipped: ${report.skipped.length}`);
  if (report.exportPath) logger.log(`   Exported to ${report.exportPath}`);
  logger.log('   Next: review the markdown, personalize as needed and send manually.');
  logger.log(RULE);
}
