import { createHash } from 'crypto';
import { existsSync } from 'fs';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { basename, dirname } from 'path';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { stringify } from 'csv-stringify/sync';

import { type ScoutConfig, scoutConfig } from '@/config/scout.config';
import { LeadsStoreService } from '@/modules/leads/application/services/leads-store.service';
import { domainFromUrl } from '@/modules/leads/application/utils/normalize';
import { normalizeOrgName } from '@/modules/leads/application/utils/name-similarity';
import { errorMessage } from '@/modules/leads/domain/errors';
import type { Lead } from '@/modules/leads/domain/lead';
import {
  applyExtrasSidecar,
  type ExtrasSidecar,
  exportExtras,
  exportRows,
  extrasSidecarPath,
  importRows,
  type LegacyUpdate,
  parseExtrasSidecar,
} from '@/modules/legacy/application/mappers/legacy-row.mapper';
import {
  SPREADSHEET_PARSER,
  type SpreadsheetParserPort,
} from '@/modules/legacy/application/ports/spreadsheet-parser.port';
import type { ExportResult, ImportReport } from '@/modules/legacy/domain/import-report';
import { LEGACY_COLUMNS } from '@/modules/legacy/domain/legacy-row';

export interface ImportFileParams {
  path?: string;
  dryRun?: boolean;
}

/**
 * The legacy `leads.csv` is a projection of the canonical store: exports are
 * always re-derived from it, imports flow back through the normal upsert.
 */
@Injectable()
export class LegacyViewService {
  private readonly logger = new Logger(LegacyViewService.name);

  constructor(
    @Inject(scoutConfig.KEY) private readonly config: ScoutConfig,
    @Inject(SPREADSHEET_PARSER) private readonly parser: SpreadsheetParserPort,
    private readonly store: LeadsStoreService,
  ) {}

  render(leads: readonly Lead[]): string {
    return stringify(exportRows(leads), {
      header: true,
      columns: [...LEGACY_COLUMNS],
      record_delimiter: 'unix',
      quoted_match: /[\r\n]/,
    });
  }

  /**
   * Waits for queued upserts, then rewrites the file and its extras sidecar
   * from the store.
   */
  async exportToFile(path: string = this.config.legacyCsvPath): Promise<ExportResult> {
    await this.store.drain();
    const leads = await this.store.listAll();
    const extrasPath = extrasSidecarPath(path);

    await mkdir(dirname(path), { recursive: true });
    await this.writeAtomically(extrasPath, `${JSON.stringify(exportExtras(leads), null, 2)}\n`);
    await this.writeAtomically(path, this.render(leads));

    this.logger.log(`Exported ${leads.length} leads to ${path}`);
    return { path, rows: leads.length, extrasPath };
  }

  async importFromFile({ path = this.config.legacyCsvPath, dryRun = false }: ImportFileParams = {}): Promise<ImportReport> {
    const buffer = await readFile(path);
    const parsed = this.parser.parse({ buffer, originalName: basename(path) });
    const rows = importRows(parsed.rows);
    const updates = applyExtrasSidecar(rows.updates, await this.readExtras(path));
    const errors = rows.errors;

    const report: ImportReport = {
      file: {
        name: basename(path),
        hash: createHash('sha256').update(buffer).digest('hex'),
        rows: parsed.rows.length,
      },
      totals: { processed: 0, created: 0, updated: 0, unchanged: 0, errors: errors.length },
      errors: errors.map((e) => ({ row: e.row, kind: e.kind, reason: e.message })),
      dryRun,
    };

    for (const error of errors) {
      this.logger.warn(error.message);
    }

    for (const update of updates) {
      report.totals.processed++;
      const outcome = await this.apply(update, dryRun);
      report.totals[outcome]++;
    }

    await this.store.drain();
    this.logger.log(
      `Imported ${report.totals.processed} rows from ${path} (created=${report.totals.created}, updated=${report.totals.updated}, unchanged=${report.totals.unchanged}, errors=${report.totals.errors})`,
    );
    return report;
  }

  /** First run against an empty store: adopt the existing flat file. */
  async seedIfEmpty(path: string = this.config.legacyCsvPath): Promise<ImportReport | null> {
    if ((await this.store.count()) > 0 || !existsSync(path)) return null;

    this.logger.log(`Store is empty, seeding from ${path}`);
    return this.importFromFile({ path });
  }

  // write-then-rename so readers never see a half-written file
  private async writeAtomically(path: string, content: string): Promise<void> {
    const tmp = `${path}.${process.pid}.tmp`;
    await writeFile(tmp, content, 'utf-8');
    await rename(tmp, path);
  }

  private async readExtras(legacyPath: string): Promise<ExtrasSidecar> {
    const path = extrasSidecarPath(legacyPath);
    if (!existsSync(path)) return {};

    try {
      return parseExtrasSidecar(JSON.parse(await readFile(path, 'utf-8')));
    } catch (error) {
      throw new Error(`Invalid extras file ${path}: ${errorMessage(error)}`);
    }
  }

  private async apply(update: LegacyUpdate, dryRun: boolean): Promise<'created' | 'updated' | 'unchanged'> {
    const existing = await this.locate(update);

    if (dryRun) {
      if (!existing) return 'created';
      return this.store.preview(existing, update.fields).changed.length > 0 ? 'updated' : 'unchanged';
    }

    const result = await this.store.upsert(existing?.lead_id ?? update.leadId, update.fields, {
      keepUnknownId: true,
    });
    if (result.created) return 'created';
    return result.changed.length > 0 ? 'updated' : 'unchanged';
  }

  /**
   * lead_id first; hand-added rows without one are matched by domain, then by
   * normalized school name.
   */
  private async locate(update: LegacyUpdate): Promise<Lead | null> {
    if (update.leadId) {
      const byId = await this.store.find(update.leadId);
      if (byId) return byId;
    }

    const domain = domainFromUrl(update.fields.domain ?? update.fields.website);
    if (domain) return this.store.findByDomain(domain);

    if (update.leadId) return null;

    const name = normalizeOrgName(update.fields.name);
    if (!name) return null;
    const all = await this.store.listAll();
    return all.find((l) => normalizeOrgName(l.name) === name) ?? null;
  }
}
