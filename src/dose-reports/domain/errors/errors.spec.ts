import { DocumentReadError } from './document-read.error';
import { ExportWriteError } from './export-write.error';
import { ReportInputError } from './report-input.error';

describe('DocumentReadError', () => {
  it('should keep the file path and truncate long reasons', () => {
    const cause = new Error('bad xref');
    const error = new DocumentReadError({
      filePath: 'ct_reports/a.pdf',
      reason: 'x'.repeat(250),
      cause,
    });

    expect(error).toBeInstanceOf(DocumentReadError);
    expect(error.name).toBe('DocumentReadError');
    expect(error.reason).toHaveLength(200);
    expect(error.cause).toBe(cause);
    expect(error.toJSON()).toEqual({
      error: 'DocumentReadError',
      filePath: 'ct_reports/a.pdf',
      reason: 'x'.repeat(200),
      timestamp: error.timestamp,
    });
  });
});

describe('ExportWriteError', () => {
  it('should name the target in its message', () => {
    const error = new ExportWriteError({
      targetPath: 'out/ct_reports_all.json',
      reason: 'EACCES',
    });

    expect(error).toBeInstanceOf(ExportWriteError);
    expect(error.message).toBe('Unable to write out/ct_reports_all.json: EACCES');
    expect(error.targetPath).toBe('out/ct_reports_all.json');
  });
});

describe('ReportInputError', () => {
  it('should copy violations when a source path is attached', () => {
    const error = new ReportInputError({
      message: 'Report record does not match the dose report shape',
      violations: ['0.essential.patient_id'],
    });

    const located = error.withSource('out/ct_reports_all.json');

    expect(error.sourcePath).toBeNull();
    expect(located).toBeInstanceOf(ReportInputError);
    expect(located.toJSON()).toEqual({
      error: 'ReportInputError',
      message: 'Report record does not match the dose report shape',
      sourcePath: 'out/ct_reports_all.json',
      violations: ['0.essential.patient_id'],
    });
  });
});
