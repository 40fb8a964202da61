export interface SpreadsheetRow {
  [columnKey: string]: string;
}

export interface ParsedSpreadsheet {
  headers: string[];
  rows: SpreadsheetRow[];
}
