import { accessSync, constants, existsSync, mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import Database from 'better-sqlite3';

import { errorMessage } from '@/modules/leads/domain/errors';

export const IN_MEMORY = ':memory:';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS leads (
    lead_id TEXT PRIMARY KEY,
    name TEXT,
    website TEXT,
    domain TEXT,
    provider TEXT,
    contact_email TEXT,
    contact_role TEXT,
    all_emails TEXT NOT NULL DEFAULT '[]',
    primary_contact TEXT,
    linkedin_url TEXT,
    contact_method TEXT,
    contact_score REAL,
    contact_priority_label TEXT,
    contact_form_url TEXT,
    contact_page TEXT,
    about_page TEXT,
    personalization_hook TEXT,
    enriched_at TEXT,
    email1_path TEXT,
    followup_path TEXT,
    brief_path TEXT,
    notes TEXT,
    extras_json TEXT NOT NULL DEFAULT '{}',
    updated_at TEXT NOT NULL
  );
  CREATE UNIQUE INDEX IF NOT EXISTS idx_leads_domain
    ON leads(domain) WHERE domain IS NOT NULL AND domain <> '';
`;

/** Fails fast when the configured location cannot be written. */
function assertWritable(dbPath: string): void {
  const file = resolve(dbPath);
  const dir = dirname(file);

  try {
    mkdirSync(dir, { recursive: true });
    accessSync(dir, constants.W_OK);
    if (existsSync(file)) accessSync(file, constants.W_OK);
  } catch (error) {
    throw new Error(`SCOUT_DB_PATH is not writable (${file}): ${errorMessage(error)}`);
  }
}

export function openScoutDatabase(dbPath: string): Database.Database {
  if (dbPath !== IN_MEMORY) assertWritable(dbPath);

  const db = new Database(dbPath);
  if (dbPath !== IN_MEMORY) db.pragma('journal_mode = WAL');
  db.exec(SCHEMA);
  return db;
}
