import type { Provider } from '@nestjs/common';

import { type ScoutConfig, scoutConfig } from '@/config/scout.config';
import { openScoutDatabase } from '@/infra/sqlite/sqlite.provider';
import { createSupabaseClient } from '@/infra/supabase/supabase.provider';
import {
  LEADS_REPOSITORY,
  type LeadsRepositoryPort,
} from '@/modules/leads/application/ports/leads-repository.port';
import { SqliteLeadsRepository } from '@/modules/leads/infra/repositories/sqlite-leads.repository';
import { SupabaseLeadsRepository } from '@/modules/leads/infra/repositories/supabase-leads.repository';

export function createLeadsRepository(config: ScoutConfig): LeadsRepositoryPort {
  switch (config.storeDriver) {
    case 'supabase':
      return new SupabaseLeadsRepository(createSupabaseClient(config));
    case 'sqlite':
      return new SqliteLeadsRepository(openScoutDatabase(config.dbPath));
  }
}

export const leadsRepositoryProvider: Provider = {
  provide: LEADS_REPOSITORY,
  inject: [scoutConfig.KEY],
  useFactory: (config: ScoutConfig) => createLeadsRepository(config),
};
