import { Injectable, Logger } from '@nestjs/common';
import { DoseReportsService } from '../../dose-reports/dose-reports.service';
import { ReportInputError } from '../../dose-reports/domain/errors/report-input.error';
import { ExportWriteError } from '../../dose-reports/domain/errors/export-write.error';
import { SpreadsheetCommandArgs } from '../cli-arguments';

/**
 * `ct-dose spreadsheet`: exported JSON -> dose sheet (.xlsx).
 */
@Injectable()
export class ExportSpreadsheetCommand {
  private readonly logger = new Logger(ExportSpreadsheetCommand.name);

  constructor(private readonly doseReportsService: DoseReportsService) {}

  async run(args: SpreadsheetCommandArgs): Promise<number> {
    try {
      const result = await this.doseReportsService.exportSpreadsheet({
        inputDir: args.inputFolder,
        outputFile: args.output,
      });
      this.logger.log(
        `Spreadsheet written: ${result.outputFile} (${result.rowCount} row(s))`,
      );
      return 0;
    } catch (error) {
      if (error instanceof ReportInputError) {
        const details =
          error.violations.length > 0
            ? ` (${error.violations.slice(0, 5).join(', ')})`
            : '';
        this.logger.error(`${error.message}${details}`);
        return 1;
      }
      if (error instanceof ExportWriteError) {
        this.logger.error(error.message);
        return 1;
      }
      throw error;
    }
  }
}
