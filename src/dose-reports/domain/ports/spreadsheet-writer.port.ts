export type SpreadsheetCell = string | number;

export interface SpreadsheetSheet {
  name: string;
  rows: SpreadsheetCell[][]; // First row is the header
  columnWidths?: number[]; // In characters
}

export interface SpreadsheetWriterPort {
  /**
   * Write a single-sheet workbook
   * @throws ExportWriteError when the file cannot be written
   */
  writeWorkbook(filePath: string, sheet: SpreadsheetSheet): Promise<void>;
}
