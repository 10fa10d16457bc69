import { normalizeReportText } from './text-normalizer';

describe('normalizeReportText', () => {
  it('should normalize line endings and collapse inline whitespace', () => {
    const raw = 'Patient ID:\t 123  \r\nStudy   ID: 9\rSex: F';

    expect(normalizeReportText(raw)).toBe(
      'Patient ID: 123\nStudy ID: 9\nSex: F',
    );
  });

  it('should collapse blank line runs and drop leading and trailing blanks', () => {
    const raw = '\n\n  \nFirst\n\n\n\nSecond\n   \n\n';

    expect(normalizeReportText(raw)).toBe('First\n\nSecond');
  });

  it('should rejoin a stranded label with the value on the next line', () => {
    const raw = 'Patient ID:\n556677\nKVP =\n110 kV';

    expect(normalizeReportText(raw)).toBe(
      'Patient ID: 556677\nKVP = 110 kV',
    );
  });

  it('should not rejoin when the next line starts its own label', () => {
    const raw = 'Comment:\nAcquisition Protocol: Head';

    expect(normalizeReportText(raw)).toBe(
      'Comment:\nAcquisition Protocol: Head',
    );
  });

  it('should not pull an acquisition heading onto a stranded label', () => {
    const raw = 'Comment:\nCT Acquisition\nTarget Region:\n3.2 CT Acquisition';

    expect(normalizeReportText(raw)).toBe(
      'Comment:\nCT Acquisition\nTarget Region:\n3.2 CT Acquisition',
    );
  });

  it('should not pull a numbered section heading onto an empty label', () => {
    const raw =
      'Patient ID: 4455667\nStudy ID:\n2 Irradiation\nTotal Number of Irradiation Events = 2 events';

    expect(normalizeReportText(raw)).toBe(raw);
  });

  it('should still rejoin a count whose unit follows the number', () => {
    expect(
      normalizeReportText('Number of X-Ray Sources =\n1 X-Ray sources'),
    ).toBe('Number of X-Ray Sources = 1 X-Ray sources');
  });

  it('should not rejoin across a blank line', () => {
    expect(normalizeReportText('Comment:\n\nHead')).toBe('Comment:\n\nHead');
  });

  it('should be idempotent', () => {
    const raw =
      ' By Test Hospital on CT, Jan 1, 2025 \r\n\r\n\r\nPatient ID:\n12\nX-Ray Tube Current =\n(approx) 5 mA\nnext:\nvalue';
    const once = normalizeReportText(raw);

    expect(normalizeReportText(once)).toBe(once);
  });

  it('should return an empty string for empty or whitespace-only input', () => {
    expect(normalizeReportText('')).toBe('');
    expect(normalizeReportText(' \n\t\n ')).toBe('');
  });
});
