import { Injectable, Logger } from '@nestjs/common';
import { basename } from 'node:path';
import { DoseReportsService } from '../../dose-reports/dose-reports.service';
import { ExtractionStatus } from '../../dose-reports/domain/enums/extraction-status.enum';
import { ExtractCommandArgs } from '../cli-arguments';

/**
 * `ct-dose extract`: PDFs -> per-patient JSON + aggregate JSON.
 * Exit code 1 when any document failed, any artifact was not written, or
 * nothing was extracted.
 */
@Injectable()
export class ExtractReportsCommand {
  private readonly logger = new Logger(ExtractReportsCommand.name);

  constructor(private readonly doseReportsService: DoseReportsService) {}

  async run(args: ExtractCommandArgs): Promise<number> {
    const result = await this.doseReportsService.extractFolder({
      sourceDir: args.folder,
      outputDir: args.outputFolder,
      aggregateFileName: args.output,
    });

    for (const outcome of result.documents) {
      if (outcome.status === ExtractionStatus.FAILED) {
        this.logger.warn(
          `Skipped ${basename(outcome.filePath)}: ${outcome.error?.reason ?? 'unknown error'}`,
        );
      }
    }
    const unwritten = result.exports.filter((outcome) => outcome.error);
    for (const outcome of unwritten) {
      this.logger.warn(`Not written: ${outcome.targetPath}`);
    }

    const failed = result.documents.length - result.reports.length;
    if (result.reports.length === 0 || failed > 0 || unwritten.length > 0) {
      return 1;
    }
    return 0;
  }
}
