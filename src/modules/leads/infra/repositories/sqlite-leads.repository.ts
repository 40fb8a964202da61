import { Injectable, type OnModuleDestroy } from '@nestjs/common';
import Database from 'better-sqlite3';

import type { LeadsRepositoryPort } from '@/modules/leads/application/ports/leads-repository.port';
import { ConstraintViolationError } from '@/modules/leads/domain/errors';
import type { Lead } from '@/modules/leads/domain/lead';
import {
  LEAD_COLUMNS,
  type LeadRow,
  leadToRow,
  rowToLead,
} from '@/modules/leads/infra/repositories/lead-row.mapper';

const UPSERT_SQL = `
  INSERT INTO leads (${LEAD_COLUMNS.join(', ')})
  VALUES (${LEAD_COLUMNS.map((c) => `@${c}`).join(', ')})
  ON CONFLICT(lead_id) DO UPDATE SET
    ${LEAD_COLUMNS.filter((c) => c !== 'lead_id')
      .map((c) => `${c} = excluded.${c}`)
      .join(',\n    ')}
`;

@Injectable()
export class SqliteLeadsRepository implements LeadsRepositoryPort, OnModuleDestroy {
  private readonly byId: Database.Statement<[string], LeadRow>;
  private readonly byDomain: Database.Statement<[string], LeadRow>;
  private readonly all: Database.Statement<[], LeadRow>;
  private readonly total: Database.Statement<[], { n: number }>;
  private readonly upsert: Database.Statement<[LeadRow]>;
  private readonly saveTx: (lead: Lead, updatedAt: string) => void;

  constructor(private readonly db: Database.Database) {
    this.byId = db.prepare<[string], LeadRow>('SELECT * FROM leads WHERE lead_id = ?');
    this.byDomain = db.prepare<[string], LeadRow>('SELECT * FROM leads WHERE domain = ?');
    this.all = db.prepare<[], LeadRow>('SELECT * FROM leads ORDER BY lead_id ASC');
    this.total = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM leads');
    this.upsert = db.prepare<[LeadRow]>(UPSERT_SQL);

    // Domain check and write share one transaction: no other writer can slip a
    // row in between.
    this.saveTx = db.transaction((lead: Lead, updatedAt: string) => {
      if (lead.domain) {
        const owner = this.byDomain.get(lead.domain);
        if (owner && owner.lead_id !== lead.lead_id) {
          throw new ConstraintViolationError(lead.domain, owner.lead_id);
        }
      }
      this.upsert.run(leadToRow(lead, updatedAt));
    });
  }

  async findById(id: string): Promise<Lead | null> {
    const row = this.byId.get(id);
    return row ? rowToLead(row) : null;
  }

  async findByDomain(domain: string): Promise<Lead | null> {
    const row = this.byDomain.get(domain);
    return row ? rowToLead(row) : null;
  }

  async listAll(): Promise<Lead[]> {
    return this.all.all().map(rowToLead);
  }

  async count(): Promise<number> {
    return this.total.get()?.n ?? 0;
  }

  async save(lead: Lead): Promise<void> {
    try {
      this.saveTx(lead, new Date().toISOString());
    } catch (error) {
      if (
        error instanceof Database.SqliteError &&
        error.code === 'SQLITE_CONSTRAINT_UNIQUE' &&
        lead.domain
      ) {
        const owner = this.byDomain.get(lead.domain);
        throw new ConstraintViolationError(lead.domain, owner?.lead_id ?? 'unknown');
      }
      throw error;
    }
  }

  onModuleDestroy(): void {
    if (this.db.open) this.db.close();
  }
}
