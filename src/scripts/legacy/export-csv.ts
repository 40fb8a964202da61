import 'reflect-metadata';
import { Logger } from '@nestjs/common';

import { LegacyViewService } from '@/modules/legacy/application/services/legacy-view.service';
import { optionValue, runScript, withScoutContext } from '@/scripts/script-context';

const logger = new Logger('LegacyExport');

runScript(logger, async () => {
  const output = optionValue(process.argv.slice(2), '--output');

  const result = await withScoutContext(logger, (ctx) => ctx.get(LegacyViewService).exportToFile(output));
  logger.log(`✅ Exported ${result.rows} leads to ${result.path}`);
});
