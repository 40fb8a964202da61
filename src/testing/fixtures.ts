import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type Database from 'better-sqlite3';

import { loadScoutConfig, type ScoutConfig } from '@/config/scout.config';
import { IN_MEMORY, openScoutDatabase } from '@/infra/sqlite/sqlite.provider';
import { ArtifactLedgerService } from '@/modules/leads/application/services/artifact-ledger.service';
import { LeadMergerService } from '@/modules/leads/application/services/lead-merger.service';
import { LeadsStoreService } from '@/modules/leads/application/services/leads-store.service';
import { emptyLead, type Lead } from '@/modules/leads/domain/lead';
import { SqliteLeadsRepository } from '@/modules/leads/infra/repositories/sqlite-leads.repository';
import { LegacyViewService } from '@/modules/legacy/application/services/legacy-view.service';
import { SpreadsheetParserService } from '@/modules/legacy/infra/parser/spreadsheet-parser.service';

export function buildLead(leadId: string, fields: Partial<Omit<Lead, 'lead_id'>> = {}): Lead {
  return { ...emptyLead(leadId), ...fields };
}

/** Config for tests: in-memory store, every file under `dir`. */
export function testConfig(dir: string, env: NodeJS.ProcessEnv = {}): ScoutConfig {
  return loadScoutConfig({
    SCOUT_DB_PATH: IN_MEMORY,
    SCOUT_LEGACY_CSV_PATH: join(dir, 'leads.csv'),
    SCOUT_DRAFTS_DIR: join(dir, 'outreach_drafts'),
    SCOUT_BRIEFS_DIR: join(dir, 'call_briefs'),
    ...env,
  });
}

export interface TestWorkspace {
  dir: string;
  config: ScoutConfig;
  db: Database.Database;
  store: LeadsStoreService;
  ledger: ArtifactLedgerService;
  legacy: LegacyViewService;
  cleanup(): void;
}

/** A temp directory plus the lead services wired over an in-memory SQLite store. */
export function createWorkspace(env: NodeJS.ProcessEnv = {}): TestWorkspace {
  const dir = mkdtempSync(join(tmpdir(), 'school-scout-'));
  const config = testConfig(dir, env);
  const db = openScoutDatabase(IN_MEMORY);
  const store = new LeadsStoreService(new SqliteLeadsRepository(db), new LeadMergerService());

  return {
    dir,
    config,
    db,
    store,
    ledger: new ArtifactLedgerService(store),
    legacy: new LegacyViewService(config, new SpreadsheetParserService(), store),
    cleanup() {
      db.close();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}
