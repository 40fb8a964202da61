import type { ErrorKind } from '@/modules/leads/domain/errors';

export interface ImportFileInfo {
  name: string;
  hash: string;
  rows: number;
}

export interface ImportError {
  row: number;
  kind: ErrorKind;
  reason: string;
}

export interface ImportTotals {
  processed: number;
  created: number;
  updated: number;
  unchanged: number;
  errors: number;
}

export interface ImportReport {
  file: ImportFileInfo;
  totals: ImportTotals;
  errors: ImportError[];
  dryRun: boolean;
}

export interface ExportResult {
  path: string;
  rows: number;
  /** Sidecar holding the extras the columns cannot carry. */
  extrasPath: string;
}
