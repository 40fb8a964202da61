import 'reflect-metadata';
import { Logger } from '@nestjs/common';

import { DiscoveryService } from '@/modules/discovery/application/services/discovery.service';
import { intOption, optionValue, RULE, runScript, withScoutContext } from '@/scripts/script-context';

const logger = new Logger('Discover');

runScript(logger, async () => {
  const args = process.argv.slice(2);
  const city = optionValue(args, '--city')?.trim();
  if (!city) throw new Error('--city is required, e.g. --city "Downey, CA"');

  const max = intOption(args, '--max', 50);
  const provider = optionValue(args, '--provider') ?? 'serpapi';

  logger.log(`🚀 Discovering schools: city="${city}", max=${max}, provider=${provider}`);

  const report = await withScoutContext(logger, (ctx) =>
    ctx.get(DiscoveryService).run({ city, max, provider }),
  );

  logger.log(RULE);
  logger.log(`✅ Found ${report.found} candidates (${report.rejected.length} rejected)`);
  logger.log(`   New leads: ${report.consolidation.created}`);
  logger.log(`   Matched by domain: ${report.consolidation.matched.domain}`);
  logger.log(`   Matched by name: ${report.consolidation.matched.fuzzy_name}`);
  logger.log(`   Exported to ${report.exportPath}`);
  logger.log(RULE);
});
