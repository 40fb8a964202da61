import type { Logger } from '@nestjs/common';

import type { LegacyViewService } from '@/modules/legacy/application/services/legacy-view.service';
import type { ImportReport } from '@/modules/legacy/domain/import-report';

export interface PrepareOptions {
  /** Adopt the legacy file first when the store is empty. Default true. */
  seed?: boolean;
  /** A dry run never writes, so it never seeds either. */
  dryRun?: boolean;
}

export async function prepareStore(
  legacy: LegacyViewService,
  logger: Logger,
  { seed = true, dryRun = false }: PrepareOptions = {},
): Promise<ImportReport | null> {
  if (!seed) return null;
  if (dryRun) {
    logger.log('🧪 Dry run: store left as is, no seeding from the legacy file');
    return null;
  }

  const seeded = await legacy.seedIfEmpty();
  if (seeded) logger.log(`🌱 Seeded ${seeded.totals.created} leads from ${seeded.file.name}`);
  return seeded;
}
