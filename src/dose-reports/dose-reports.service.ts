import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { basename, join } from 'node:path';
import { AllConfigType } from '../config/config.type';
import { DoseReport } from './domain/entities/dose-report.entity';
import { ExtractionStatus } from './domain/enums/extraction-status.enum';
import { ExportArtifactKind } from './domain/enums/export-artifact.enum';
import { DocumentReadError } from './domain/errors/document-read.error';
import { ExportWriteError } from './domain/errors/export-write.error';
import { ReportInputError } from './domain/errors/report-input.error';
import { DocumentRendererPort } from './domain/ports/document-renderer.port';
import { ReportStorePort } from './domain/ports/report-store.port';
import { SpreadsheetWriterPort } from './domain/ports/spreadsheet-writer.port';
import { ReportAssemblerDomainService } from './domain/services/report-assembler.domain.service';
import { ReportJsonMapper } from './export/report-json.mapper';
import { buildDoseSheet } from './export/dose-sheet';

export interface ExtractFolderOptions {
  sourceDir?: string;
  outputDir?: string;
  aggregateFileName?: string;
}

export interface DocumentOutcome {
  filePath: string;
  status: ExtractionStatus;
  report: DoseReport | null;
  error: DocumentReadError | null;
}

export interface ExportOutcome {
  kind: ExportArtifactKind;
  targetPath: string;
  reportCount: number;
  error: ExportWriteError | null;
}

export interface ExtractionRunResult {
  /** Assembled reports in discovery order */
  reports: DoseReport[];
  documents: DocumentOutcome[];
  exports: ExportOutcome[];
}

export interface ExportSpreadsheetOptions {
  inputDir?: string;
  outputFile?: string;
}

export interface SpreadsheetExportResult {
  sourcePath: string;
  outputFile: string;
  reportCount: number;
  rowCount: number;
}

export const PATIENT_REPORT_PREFIX = 'ct_report_';

/**
 * File name for one patient's reports; characters unsafe in file names
 * become "_".
 */
export function patientReportFileName(patientId: string): string {
  return `${PATIENT_REPORT_PREFIX}${patientId.replace(/[^A-Za-z0-9._-]/g, '_')}.json`;
}

/**
 * DoseReportsService
 *
 * Batch use cases over a folder of dose reports:
 * - extractFolder: render + assemble every PDF, then write per-patient and
 *   aggregate JSON
 * - exportSpreadsheet: read exported JSON back and write the dose sheet
 *
 * Documents are processed one at a time in file name order. A document that
 * cannot be read is recorded as FAILED and the run continues; an artifact
 * that cannot be written is recorded against that artifact only.
 */
@Injectable()
export class DoseReportsService {
  private readonly logger = new Logger(DoseReportsService.name);

  constructor(
    @Inject('DocumentRendererPort')
    private readonly renderer: DocumentRendererPort,
    @Inject('ReportStorePort')
    private readonly store: ReportStorePort,
    @Inject('SpreadsheetWriterPort')
    private readonly spreadsheetWriter: SpreadsheetWriterPort,
    private readonly assembler: ReportAssemblerDomainService,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  async extractFolder(
    options: ExtractFolderOptions = {},
  ): Promise<ExtractionRunResult> {
    const sourceDir =
      options.sourceDir ??
      this.configService.getOrThrow('doseReports.sourceDir', { infer: true });
    const outputDir =
      options.outputDir ??
      this.configService.getOrThrow('doseReports.outputDir', { infer: true });
    const aggregateFileName =
      options.aggregateFileName ??
      this.configService.getOrThrow('doseReports.aggregateFileName', {
        infer: true,
      });

    const files = await this.store.listSourceDocuments(sourceDir);
    if (files.length === 0) {
      this.logger.warn(`[EXTRACT] No PDF files found in ${sourceDir}`);
      return { reports: [], documents: [], exports: [] };
    }
    this.logger.log(`[EXTRACT] Found ${files.length} PDF file(s) in ${sourceDir}`);

    const documents: DocumentOutcome[] = [];
    for (const filePath of files) {
      documents.push(await this.extractDocument(filePath));
    }

    const reports = documents.flatMap((outcome) =>
      outcome.report ? [outcome.report] : [],
    );
    const exports = await this.writeJsonExports(
      reports,
      outputDir,
      aggregateFileName,
    );

    const failed = documents.length - reports.length;
    this.logger.log(
      `[EXTRACT] Done: processed=${reports.length}, failed=${failed}, artifacts=${exports.filter((e) => !e.error).length}/${exports.length}`,
    );
    return { reports, documents, exports };
  }

  async exportSpreadsheet(
    options: ExportSpreadsheetOptions = {},
  ): Promise<SpreadsheetExportResult> {
    const inputDir =
      options.inputDir ??
      this.configService.getOrThrow('doseReports.outputDir', { infer: true });
    const outputFile =
      options.outputFile ??
      this.configService.getOrThrow('doseReports.spreadsheetFile', {
        infer: true,
      });
    const aggregateFileName = this.configService.getOrThrow(
      'doseReports.aggregateFileName',
      { infer: true },
    );

    const sourcePath = await this.store.findReportFile(
      inputDir,
      aggregateFileName,
    );
    if (!sourcePath) {
      throw new ReportInputError({
        message: `No JSON report file found in ${inputDir}`,
        sourcePath: inputDir,
      });
    }
    if (basename(sourcePath) !== aggregateFileName) {
      this.logger.log(
        `[SPREADSHEET] ${aggregateFileName} not found, using ${basename(sourcePath)}`,
      );
    }

    let reports: DoseReport[];
    try {
      reports = ReportJsonMapper.fromJsonCollection(
        await this.store.readJson(sourcePath),
      );
    } catch (error) {
      throw error instanceof ReportInputError
        ? error.withSource(sourcePath)
        : error;
    }

    const sheet = buildDoseSheet(reports);
    await this.spreadsheetWriter.writeWorkbook(outputFile, sheet);

    this.logger.log(
      `[SPREADSHEET] ${reports.length} report(s), ${sheet.rows.length - 1} row(s) -> ${outputFile}`,
    );
    return {
      sourcePath,
      outputFile,
      reportCount: reports.length,
      rowCount: sheet.rows.length - 1,
    };
  }

  private async extractDocument(filePath: string): Promise<DocumentOutcome> {
    const name = basename(filePath);
    try {
      const text = await this.renderer.renderText(filePath);
      const report = this.assembler.assembleRaw(text);
      this.logger.log(
        `[EXTRACT] ${name}: ${report.acquisitions.length} acquisition(s)`,
      );
      return {
        filePath,
        status: ExtractionStatus.PROCESSED,
        report,
        error: null,
      };
    } catch (error) {
      const readError =
        error instanceof DocumentReadError
          ? error
          : new DocumentReadError({
              filePath,
              reason: error instanceof Error ? error.message : String(error),
              cause: error,
            });
      this.logger.error(
        `[EXTRACT] ${name} failed: ${readError.reason}`,
        error instanceof Error ? error.stack : undefined,
      );
      return {
        filePath,
        status: ExtractionStatus.FAILED,
        report: null,
        error: readError,
      };
    }
  }

  private async writeJsonExports(
    reports: DoseReport[],
    outputDir: string,
    aggregateFileName: string,
  ): Promise<ExportOutcome[]> {
    const outcomes: ExportOutcome[] = [];
    if (reports.length === 0) {
      this.logger.warn('[EXTRACT] No reports assembled, nothing to export');
      return outcomes;
    }

    const byPatient = new Map<string, DoseReport[]>();
    for (const report of reports) {
      const patientId = report.essential.patientId;
      if (!patientId) {
        this.logger.warn(
          '[EXTRACT] Report without patient ID, no individual file written',
        );
        continue;
      }
      byPatient.set(patientId, [...(byPatient.get(patientId) ?? []), report]);
    }

    for (const [patientId, patientReports] of byPatient) {
      outcomes.push(
        await this.writeArtifact(
          ExportArtifactKind.PATIENT_JSON,
          join(outputDir, patientReportFileName(patientId)),
          patientReports,
        ),
      );
    }

    outcomes.push(
      await this.writeArtifact(
        ExportArtifactKind.AGGREGATE_JSON,
        join(outputDir, aggregateFileName),
        reports,
      ),
    );
    return outcomes;
  }

  private async writeArtifact(
    kind: ExportArtifactKind,
    targetPath: string,
    reports: DoseReport[],
  ): Promise<ExportOutcome> {
    try {
      await this.store.writeJson(
        targetPath,
        reports.map((report) => ReportJsonMapper.toJson(report)),
      );
      return { kind, targetPath, reportCount: reports.length, error: null };
    } catch (error) {
      if (!(error instanceof ExportWriteError)) {
        throw error;
      }
      this.logger.error(`[EXTRACT] ${error.message}`);
      return { kind, targetPath, reportCount: reports.length, error };
    }
  }
}
