import {
  buildDoseSheet,
  buildDoseSheetRows,
  DOSE_SHEET_NAME,
  toCell,
} from './dose-sheet';
import {
  buildAcquisition,
  buildDoseReport,
} from '../../../test/utils/dose-report.factory';

describe('dose sheet', () => {
  const HEADER = [
    'Patient ID',
    'Sex',
    'Birth Date',
    'Age',
    'Protocol',
    'Exam Date',
    'Series Description',
    'Scan Mode',
    'mAs',
    'kV',
    'CTDIvol',
    'DLP',
    'Total DLP',
    'Phantom Type',
    'SSDE',
    'Avg Scan Size',
  ];

  describe('toCell', () => {
    it('should render null, blank and "null" as a dash', () => {
      expect(toCell(null)).toBe('-');
      expect(toCell(undefined)).toBe('-');
      expect(toCell('   ')).toBe('-');
      expect(toCell('null')).toBe('-');
      expect(toCell('NULL')).toBe('-');
    });

    it('should keep numbers and trimmed text', () => {
      expect(toCell(0)).toBe(0);
      expect(toCell(' 120 kV ')).toBe('120 kV');
    });
  });

  describe('buildDoseSheetRows', () => {
    it('should write the header in fixed order', () => {
      expect(buildDoseSheetRows([])).toEqual([HEADER]);
    });

    it('should write one row per acquisition', () => {
      const report = buildDoseReport({
        essential: {
          patientId: '4455667',
          sex: 'F',
          birthDate: 'Jul 1, 1997',
          studyDate: 'May 5, 2025',
        },
        irradiation: { totalDlp: '445.02 mGy.cm' },
        acquisitions: [
          buildAcquisition({
            protocol: 'Head Routine',
            comment: 'Axial 5mm',
            acquisitionType: 'Spiral Acquisition',
            xraySourceParams: { kvp: '120 kV', tubeCurrent: '280 mA' },
            ctDose: {
              meanCtdivol: '45.1 mGy',
              dlp: '400.02 mGy.cm',
              phantomType: 'IEC Head Dosimetry Phantom',
              sizeSpecificDose: '50.3 mGy',
              waterEquivalentDiameter: '180 mm',
            },
          }),
          buildAcquisition({ protocol: 'Topogram', comment: '' }),
        ],
      });

      const rows = buildDoseSheetRows([report]);

      expect(rows).toHaveLength(3);
      expect(rows[1]).toEqual([
        '4455667',
        'F',
        'Jul 1, 1997',
        27,
        'Head Routine',
        'May 5, 2025',
        'Axial 5mm',
        'Spiral Acquisition',
        '280 mA',
        '120 kV',
        '45.1 mGy',
        '400.02 mGy.cm',
        '445.02 mGy.cm',
        'IEC Head Dosimetry Phantom',
        '50.3 mGy',
        '180 mm',
      ]);
      expect(rows[2]).toEqual([
        '4455667',
        'F',
        'Jul 1, 1997',
        27,
        'Topogram',
        'May 5, 2025',
        '-',
        '-',
        '-',
        '-',
        '-',
        '-',
        '445.02 mGy.cm',
        '-',
        '-',
        '-',
      ]);
    });

    it('should write one dash-filled row for a report without acquisitions', () => {
      const report = buildDoseReport({
        essential: { patientId: '1002' },
      });

      expect(buildDoseSheetRows([report])[1]).toEqual([
        '1002',
        ...Array.from({ length: 15 }, () => '-'),
      ]);
    });

    it('should fall back to the report date for the age', () => {
      const report = buildDoseReport({
        reportDate: 'Jan 1, 2025',
        essential: { birthDate: 'Jan 1, 2000' },
      });

      expect(buildDoseSheetRows([report])[1][3]).toBe(25);
    });
  });

  describe('buildDoseSheet', () => {
    it('should name the sheet and set one width per column', () => {
      const sheet = buildDoseSheet([]);

      expect(sheet.name).toBe(DOSE_SHEET_NAME);
      expect(sheet.columnWidths).toEqual([
        15, 10, 18, 10, 20, 18, 20, 15, 10, 10, 10, 10, 10, 15, 10, 15,
      ]);
    });
  });
});
