import { Injectable, Logger } from '@nestjs/common';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import * as xlsx from 'xlsx';
import {
  SpreadsheetSheet,
  SpreadsheetWriterPort,
} from '../../domain/ports/spreadsheet-writer.port';
import { ExportWriteError } from '../../domain/errors/export-write.error';

/**
 * Writes a single-sheet .xlsx workbook with SheetJS.
 */
@Injectable()
export class XlsxSpreadsheetAdapter implements SpreadsheetWriterPort {
  private readonly logger = new Logger(XlsxSpreadsheetAdapter.name);

  async writeWorkbook(filePath: string, sheet: SpreadsheetSheet): Promise<void> {
    const worksheet = xlsx.utils.aoa_to_sheet(sheet.rows);
    if (sheet.columnWidths) {
      worksheet['!cols'] = sheet.columnWidths.map((wch) => ({ wch }));
    }
    const workbook = xlsx.utils.book_new();
    // Sheet names are limited to 31 characters
    xlsx.utils.book_append_sheet(workbook, worksheet, sheet.name.slice(0, 31));

    try {
      await mkdir(dirname(filePath), { recursive: true });
      xlsx.writeFile(workbook, filePath);
    } catch (error) {
      throw new ExportWriteError({
        targetPath: filePath,
        reason: error instanceof Error ? error.message : String(error),
        cause: error,
      });
    }

    this.logger.log(
      `[XLSX] Wrote ${sheet.rows.length - 1} row(s) to ${filePath}`,
    );
  }
}
