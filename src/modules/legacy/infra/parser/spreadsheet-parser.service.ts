import { Injectable } from '@nestjs/common';
import * as XLSX from 'xlsx';
import { parse as csvParse } from 'csv-parse/sync';

import type { ParsedSpreadsheet, SpreadsheetRow } from '@/modules/legacy/domain/spreadsheet-row';
import type {
  ParseSpreadsheetParams,
  SpreadsheetParserPort,
} from '@/modules/legacy/application/ports/spreadsheet-parser.port';

const XLSX_MIME_TYPES = new Set([
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  'application/vnd.ms-excel',
]);

/**
 * Reads the legacy sheet as strings, cell for cell. Nothing is trimmed or
 * coerced: what was exported must come back unchanged.
 */
@Injectable()
export class SpreadsheetParserService implements SpreadsheetParserPort {
  parse(params: ParseSpreadsheetParams): ParsedSpreadsheet {
    const { buffer, mimeType, originalName } = params;
    const lowerName = originalName.toLowerCase();

    if (mimeType === 'text/csv' || lowerName.endsWith('.csv')) {
      return this.parseCsv(buffer);
    }

    if (
      (mimeType && XLSX_MIME_TYPES.has(mimeType)) ||
      lowerName.endsWith('.xlsx') ||
      lowerName.endsWith('.xls')
    ) {
      return this.parseExcel(buffer);
    }

    throw new Error(`Unsupported spreadsheet format: ${mimeType ?? originalName}`);
  }

  private parseCsv(buffer: Buffer): ParsedSpreadsheet {
    const records: string[][] = csvParse(buffer.toString('utf-8'), {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });

    return this.toRows(records);
  }

  private parseExcel(buffer: Buffer): ParsedSpreadsheet {
    const workbook = XLSX.read(buffer, {
      type: 'buffer',
      cellDates: false,
    });

    if (workbook.SheetNames.length === 0) {
      throw new Error('Excel file has no sheets');
    }
    const sheet = workbook.Sheets[workbook.SheetNames[0]];

    const records = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      defval: '',
      raw: false,
      blankrows: false,
    });

    return this.toRows(records.map((record) => record.map((cell) => (cell == null ? '' : String(cell)))));
  }

  private toRows(records: string[][]): ParsedSpreadsheet {
    if (records.length === 0) {
      throw new Error('Spreadsheet is empty or has no header row');
    }

    const [headers, ...body] = records;
    const rows = body.map((cells) => {
      const row: SpreadsheetRow = {};
      headers.forEach((header, i) => {
        row[header] = cells[i] ?? '';
      });
      return row;
    });

    return { headers, rows };
  }
}
