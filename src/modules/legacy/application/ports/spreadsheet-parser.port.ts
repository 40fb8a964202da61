import type { ParsedSpreadsheet } from '@/modules/legacy/domain/spreadsheet-row';

export interface ParseSpreadsheetParams {
  buffer: Buffer;
  originalName: string;
  mimeType?: string;
}

export const SPREADSHEET_PARSER = Symbol('SPREADSHEET_PARSER');

export interface SpreadsheetParserPort {
  parse(params: ParseSpreadsheetParams): ParsedSpreadsheet;
}
