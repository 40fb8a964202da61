import { UnresolvableRowError } from '@/modules/leads/domain/errors';
import type { Lead, LeadTextField, LeadUpdate } from '@/modules/leads/domain/lead';
import { cleanText } from '@/modules/leads/application/utils/normalize';
import {
  EMAIL_LIST_SEPARATOR,
  type LegacyColumn,
  type LegacyRow,
  isLegacyColumn,
} from '@/modules/legacy/domain/legacy-row';
import type { SpreadsheetRow } from '@/modules/legacy/domain/spreadsheet-row';

/** Legacy columns that carry a canonical text field under the same meaning. */
const TEXT_COLUMNS: ReadonlyArray<[LegacyColumn, LeadTextField]> = [
  ['school_name', 'name'],
  ['website', 'website'],
  ['domain', 'domain'],
  ['provider', 'provider'],
  ['contact_email', 'contact_email'],
  ['contact_role', 'contact_role'],
  ['primary_contact', 'primary_contact'],
  ['linkedin_url', 'linkedin_url'],
  ['contact_method', 'contact_method'],
  ['contact_priority_label', 'contact_priority_label'],
  ['contact_form_url', 'contact_form_url'],
  ['contact_page', 'contact_page'],
  ['about_page', 'about_page'],
  ['personalization_hook', 'personalization_hook'],
  ['enriched_at', 'enriched_at'],
  ['email1_path', 'email1_path'],
  ['followup_path', 'followup_path'],
  ['brief_path', 'brief_path'],
  ['notes', 'notes'],
];

export interface LegacyUpdate {
  /** Spreadsheet line number, header being line 1. */
  row: number;
  leadId: string | null;
  fields: LeadUpdate;
}

export function toLegacyRow(lead: Lead): LegacyRow {
  return {
    lead_id: lead.lead_id,
    school_name: lead.name ?? '',
    city: lead.extras.city ?? '',
    website: lead.website ?? '',
    domain: lead.domain ?? '',
    provider: lead.provider ?? '',
    contact_email: lead.contact_email ?? '',
    contact_role: lead.contact_role ?? '',
    all_emails: lead.all_emails.join(EMAIL_LIST_SEPARATOR),
    primary_contact: lead.primary_contact ?? '',
    linkedin_url: lead.linkedin_url ?? '',
    contact_method: lead.contact_method ?? '',
    contact_score: lead.contact_score === null ? '' : String(lead.contact_score),
    contact_priority_label: lead.contact_priority_label ?? '',
    contact_form_url: lead.contact_form_url ?? '',
    contact_page: lead.contact_page ?? '',
    about_page: lead.about_page ?? '',
    personalization_hook: lead.personalization_hook ?? '',
    enriched_at: lead.enriched_at ?? '',
    email1_path: lead.email1_path ?? '',
    followup_path: lead.followup_path ?? '',
    brief_path: lead.brief_path ?? '',
    notes: lead.notes ?? '',
  };
}

/** Rows in lead_id order so repeated exports diff cleanly. */
export function exportRows(leads: readonly Lead[]): LegacyRow[] {
  return [...leads]
    .sort((a, b) => (a.lead_id < b.lead_id ? -1 : a.lead_id > b.lead_id ? 1 : 0))
    .map(toLegacyRow);
}

/**
 * One sheet row back to a field update. Blank cells are absent from the
 * update, `city` and any column outside the fixed set land in `extras`.
 */
export function fromLegacyRow(row: SpreadsheetRow, rowNumber: number): LegacyUpdate {
  const fields: LeadUpdate = {};
  const extras: Record<string, string> = {};

  for (const [column, field] of TEXT_COLUMNS) {
    const value = cleanText(row[column]);
    if (value !== null) fields[field] = value;
  }

  const emails = (row.all_emails ?? '')
    .split(EMAIL_LIST_SEPARATOR)
    .map((e) => e.trim())
    .filter(Boolean);
  if (emails.length > 0) fields.all_emails = emails;

  const scoreCell = cleanText(row.contact_score);
  if (scoreCell !== null) {
    const score = Number(scoreCell.trim());
    if (!Number.isFinite(score)) {
      throw new UnresolvableRowError(rowNumber, `contact_score is not a number: "${scoreCell}"`);
    }
    fields.contact_score = score;
  }

  const city = cleanText(row.city);
  if (city !== null) extras.city = city;

  for (const [column, raw] of Object.entries(row)) {
    if (isLegacyColumn(column) || !column.trim()) continue;
    const value = cleanText(raw);
    if (value !== null) extras[column] = value;
  }
  if (Object.keys(extras).length > 0) fields.extras = extras;

  const leadId = cleanText(row.lead_id)?.trim() || null;
  if (!leadId && !fields.name && !fields.domain && !fields.website) {
    throw new UnresolvableRowError(rowNumber, 'no lead_id, school_name, domain or website');
  }

  return { row: rowNumber, leadId, fields };
}

export interface ImportRowsResult {
  updates: LegacyUpdate[];
  errors: UnresolvableRowError[];
}

export function importRows(rows: readonly SpreadsheetRow[]): ImportRowsResult {
  const result: ImportRowsResult = { updates: [], errors: [] };

  rows.forEach((row, index) => {
    try {
      result.updates.push(fromLegacyRow(row, index + 2));
    } catch (error) {
      if (!(error instanceof UnresolvableRowError)) throw error;
      result.errors.push(error);
    }
  });

  return result;
}

/** Extras the fixed columns cannot hold, by lead_id. Kept in `<file>.extras.json`. */
export type ExtrasSidecar = Record<string, Record<string, string>>;

export function extrasSidecarPath(legacyPath: string): string {
  return `${legacyPath}.extras.json`;
}

/** Leads with at least one extra outside the columns, keys sorted for stable diffs. */
export function exportExtras(leads: readonly Lead[]): ExtrasSidecar {
  const sidecar: ExtrasSidecar = {};

  for (const lead of [...leads].sort((a, b) => (a.lead_id < b.lead_id ? -1 : a.lead_id > b.lead_id ? 1 : 0))) {
    const keys = Object.keys(lead.extras)
      .filter((key) => !isLegacyColumn(key))
      .sort();
    if (keys.length === 0) continue;

    const extras: Record<string, string> = {};
    for (const key of keys) extras[key] = lead.extras[key];
    sidecar[lead.lead_id] = extras;
  }
  return sidecar;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Validates parsed sidecar JSON: an object of objects of strings. */
export function parseExtrasSidecar(value: unknown): ExtrasSidecar {
  if (!isRecord(value)) throw new Error('extras file must hold an object keyed by lead_id');

  const sidecar: ExtrasSidecar = {};
  for (const [leadId, entry] of Object.entries(value)) {
    if (!isRecord(entry)) throw new Error(`extras of ${leadId} must be an object`);

    const extras: Record<string, string> = {};
    for (const [key, raw] of Object.entries(entry)) {
      if (typeof raw !== 'string') throw new Error(`extras of ${leadId}: "${key}" must be a string`);
      extras[key] = raw;
    }
    sidecar[leadId] = extras;
  }
  return sidecar;
}

/** Folds sidecar extras into the rows carrying the same lead_id; cell values win. */
export function applyExtrasSidecar(updates: readonly LegacyUpdate[], sidecar: ExtrasSidecar): LegacyUpdate[] {
  return updates.map((update) => {
    const leadId = update.leadId;
    if (!leadId || !Object.prototype.hasOwnProperty.call(sidecar, leadId)) return update;
    const extras = sidecar[leadId];
    return { ...update, fields: { ...update.fields, extras: { ...extras, ...update.fields.extras } } };
  });
}
