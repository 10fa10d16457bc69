import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { join } from 'node:path';
import {
  DoseReportsService,
  patientReportFileName,
} from './dose-reports.service';
import { ReportAssemblerDomainService } from './domain/services/report-assembler.domain.service';
import { ExtractionStatus } from './domain/enums/extraction-status.enum';
import { ExportArtifactKind } from './domain/enums/export-artifact.enum';
import { DocumentReadError } from './domain/errors/document-read.error';
import { ExportWriteError } from './domain/errors/export-write.error';
import { ReportInputError } from './domain/errors/report-input.error';
import { ReportJsonMapper } from './export/report-json.mapper';
import {
  buildAcquisition,
  buildDoseReport,
} from '../../test/utils/dose-report.factory';

describe('DoseReportsService', () => {
  let service: DoseReportsService;

  const configValues: Record<string, string> = {
    'doseReports.sourceDir': 'in',
    'doseReports.outputDir': 'out',
    'doseReports.aggregateFileName': 'ct_reports_all.json',
    'doseReports.spreadsheetFile': 'out/ct_dose_report.xlsx',
  };

  const mockRenderer = { renderText: jest.fn() };
  const mockStore = {
    listSourceDocuments: jest.fn(),
    writeJson: jest.fn(),
    findReportFile: jest.fn(),
    readJson: jest.fn(),
  };
  const mockSpreadsheetWriter = { writeWorkbook: jest.fn() };
  const mockAssembler = { assembleRaw: jest.fn() };
  const mockConfig = {
    getOrThrow: jest.fn((key: string) => {
      const value = configValues[key];
      if (value === undefined) {
        throw new Error(`Unexpected config key ${key}`);
      }
      return value;
    }),
  };

  const reportsByText = {
    A: buildDoseReport({ essential: { patientId: '1' } }),
    C: buildDoseReport({
      essential: { patientId: '1' },
      acquisitions: [buildAcquisition({ protocol: 'Head' })],
    }),
    D: buildDoseReport({ hospital: 'Riverside Hospital' }),
  };

  beforeEach(async () => {
    jest.clearAllMocks();

    mockRenderer.renderText.mockImplementation(async (filePath: string) => {
      if (filePath === 'in/b.pdf') {
        throw new Error('boom');
      }
      return filePath.slice(3, 4).toUpperCase();
    });
    mockAssembler.assembleRaw.mockImplementation((text: string) => {
      if (text === 'A' || text === 'C' || text === 'D') {
        return reportsByText[text];
      }
      throw new Error(`Unexpected text ${text}`);
    });
    mockStore.writeJson.mockResolvedValue(undefined);
    mockSpreadsheetWriter.writeWorkbook.mockResolvedValue(undefined);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DoseReportsService,
        { provide: 'DocumentRendererPort', useValue: mockRenderer },
        { provide: 'ReportStorePort', useValue: mockStore },
        { provide: 'SpreadsheetWriterPort', useValue: mockSpreadsheetWriter },
        { provide: ReportAssemblerDomainService, useValue: mockAssembler },
        { provide: ConfigService, useValue: mockConfig },
      ],
    }).compile();

    service = module.get<DoseReportsService>(DoseReportsService);
  });

  describe('patientReportFileName', () => {
    it('should replace characters unsafe in file names', () => {
      expect(patientReportFileName('4455667')).toBe('ct_report_4455667.json');
      expect(patientReportFileName('AB/12 3')).toBe('ct_report_AB_12_3.json');
    });
  });

  describe('extractFolder', () => {
    it('should keep going after a document fails', async () => {
      mockStore.listSourceDocuments.mockResolvedValue([
        'in/a.pdf',
        'in/b.pdf',
        'in/c.pdf',
        'in/d.pdf',
      ]);

      const result = await service.extractFolder();

      expect(mockStore.listSourceDocuments).toHaveBeenCalledWith('in');
      expect(result.documents.map((outcome) => outcome.status)).toEqual([
        ExtractionStatus.PROCESSED,
        ExtractionStatus.FAILED,
        ExtractionStatus.PROCESSED,
        ExtractionStatus.PROCESSED,
      ]);
      expect(result.reports).toEqual([
        reportsByText.A,
        reportsByText.C,
        reportsByText.D,
      ]);

      const failure = result.documents[1].error;
      expect(failure).toBeInstanceOf(DocumentReadError);
      expect(failure?.filePath).toBe('in/b.pdf');
      expect(failure?.reason).toBe('boom');
    });

    it('should group patient files and write the aggregate last', async () => {
      mockStore.listSourceDocuments.mockResolvedValue([
        'in/a.pdf',
        'in/c.pdf',
        'in/d.pdf',
      ]);

      const result = await service.extractFolder();

      expect(result.exports).toEqual([
        {
          kind: ExportArtifactKind.PATIENT_JSON,
          targetPath: join('out', 'ct_report_1.json'),
          reportCount: 2,
          error: null,
        },
        {
          kind: ExportArtifactKind.AGGREGATE_JSON,
          targetPath: join('out', 'ct_reports_all.json'),
          reportCount: 3,
          error: null,
        },
      ]);
      expect(mockStore.writeJson).toHaveBeenNthCalledWith(
        1,
        join('out', 'ct_report_1.json'),
        [
          ReportJsonMapper.toJson(reportsByText.A),
          ReportJsonMapper.toJson(reportsByText.C),
        ],
      );
      expect(mockStore.writeJson).toHaveBeenCalledTimes(2);
    });

    it('should use folder options over configuration', async () => {
      mockStore.listSourceDocuments.mockResolvedValue(['in/a.pdf']);

      const result = await service.extractFolder({
        sourceDir: 'pdfs',
        outputDir: 'json',
        aggregateFileName: 'all.json',
      });

      expect(mockStore.listSourceDocuments).toHaveBeenCalledWith('pdfs');
      expect(result.exports.map((outcome) => outcome.targetPath)).toEqual([
        join('json', 'ct_report_1.json'),
        join('json', 'all.json'),
      ]);
    });

    it('should record an unwritable artifact and write the others', async () => {
      mockStore.listSourceDocuments.mockResolvedValue(['in/a.pdf']);
      const writeError = new ExportWriteError({
        targetPath: join('out', 'ct_report_1.json'),
        reason: 'EACCES',
      });
      mockStore.writeJson.mockRejectedValueOnce(writeError);

      const result = await service.extractFolder();

      expect(result.exports.map((outcome) => outcome.error)).toEqual([
        writeError,
        null,
      ]);
      expect(mockStore.writeJson).toHaveBeenCalledTimes(2);
    });

    it('should write nothing when no PDF files are found', async () => {
      mockStore.listSourceDocuments.mockResolvedValue([]);

      const result = await service.extractFolder();

      expect(result).toEqual({ reports: [], documents: [], exports: [] });
      expect(mockStore.writeJson).not.toHaveBeenCalled();
    });

    it('should skip exports when every document failed', async () => {
      mockStore.listSourceDocuments.mockResolvedValue(['in/b.pdf']);

      const result = await service.extractFolder();

      expect(result.documents).toHaveLength(1);
      expect(result.exports).toEqual([]);
      expect(mockStore.writeJson).not.toHaveBeenCalled();
    });
  });

  describe('exportSpreadsheet', () => {
    it('should build the dose sheet from the aggregate file', async () => {
      mockStore.findReportFile.mockResolvedValue('out/ct_reports_all.json');
      mockStore.readJson.mockResolvedValue([
        ReportJsonMapper.toJson(reportsByText.C),
        ReportJsonMapper.toJson(reportsByText.D),
      ]);

      const result = await service.exportSpreadsheet();

      expect(mockStore.findReportFile).toHaveBeenCalledWith(
        'out',
        'ct_reports_all.json',
      );
      expect(result).toEqual({
        sourcePath: 'out/ct_reports_all.json',
        outputFile: 'out/ct_dose_report.xlsx',
        reportCount: 2,
        rowCount: 2,
      });

      const [target, sheet] = mockSpreadsheetWriter.writeWorkbook.mock.calls[0];
      expect(target).toBe('out/ct_dose_report.xlsx');
      expect(sheet.name).toBe('CT Dose Reports');
      expect(sheet.rows[1][4]).toBe('Head');
      expect(sheet.rows[2][0]).toBe('-');
    });

    it('should fail when the folder holds no report JSON', async () => {
      mockStore.findReportFile.mockResolvedValue(null);

      await expect(
        service.exportSpreadsheet({ inputDir: 'empty' }),
      ).rejects.toBeInstanceOf(ReportInputError);
      expect(mockSpreadsheetWriter.writeWorkbook).not.toHaveBeenCalled();
    });

    it('should attach the source path to shape violations', async () => {
      mockStore.findReportFile.mockResolvedValue('out/ct_report_1.json');
      mockStore.readJson.mockResolvedValue([{ essential: { patient_id: 5 } }]);

      await expect(service.exportSpreadsheet()).rejects.toMatchObject({
        name: 'ReportInputError',
        sourcePath: 'out/ct_report_1.json',
        violations: ['0.essential.patient_id'],
      });
    });
  });
});
