import { Acquisition, DoseReport } from '../domain/entities/dose-report.entity';
import {
  SpreadsheetCell,
  SpreadsheetSheet,
} from '../domain/ports/spreadsheet-writer.port';
import { calculateAge } from '../utils/age-calculator';

export const DOSE_SHEET_NAME = 'CT Dose Reports';

export const PLACEHOLDER = '-';

interface DoseSheetColumn {
  header: string;
  width: number;
  value: (report: DoseReport, acquisition: Acquisition | null) => SpreadsheetCell | null;
}

// Fixed column order of the dose sheet
export const DOSE_SHEET_COLUMNS: readonly DoseSheetColumn[] = [
  { header: 'Patient ID', width: 15, value: (r) => r.essential.patientId },
  { header: 'Sex', width: 10, value: (r) => r.essential.sex },
  { header: 'Birth Date', width: 18, value: (r) => r.essential.birthDate },
  {
    header: 'Age',
    width: 10,
    value: (r) =>
      calculateAge(r.essential.birthDate, r.essential.studyDate ?? r.reportDate),
  },
  { header: 'Protocol', width: 20, value: (_r, a) => a?.protocol ?? null },
  { header: 'Exam Date', width: 18, value: (r) => r.essential.studyDate },
  {
    header: 'Series Description',
    width: 20,
    value: (_r, a) => a?.comment ?? null,
  },
  {
    header: 'Scan Mode',
    width: 15,
    value: (_r, a) => a?.acquisitionType ?? null,
  },
  {
    header: 'mAs',
    width: 10,
    value: (_r, a) => a?.xraySourceParams.tubeCurrent ?? null,
  },
  { header: 'kV', width: 10, value: (_r, a) => a?.xraySourceParams.kvp ?? null },
  {
    header: 'CTDIvol',
    width: 10,
    value: (_r, a) => a?.ctDose.meanCtdivol ?? null,
  },
  { header: 'DLP', width: 10, value: (_r, a) => a?.ctDose.dlp ?? null },
  { header: 'Total DLP', width: 10, value: (r) => r.irradiation.totalDlp },
  {
    header: 'Phantom Type',
    width: 15,
    value: (_r, a) => a?.ctDose.phantomType ?? null,
  },
  {
    header: 'SSDE',
    width: 10,
    value: (_r, a) => a?.ctDose.sizeSpecificDose ?? null,
  },
  {
    header: 'Avg Scan Size',
    width: 15,
    value: (_r, a) => a?.ctDose.waterEquivalentDiameter ?? null,
  },
];

/**
 * Missing, blank and literal "null" values all render as the placeholder.
 */
export function toCell(value: SpreadsheetCell | null | undefined): SpreadsheetCell {
  if (value === null || value === undefined) {
    return PLACEHOLDER;
  }
  if (typeof value === 'number') {
    return value;
  }
  const trimmed = value.trim();
  return trimmed === '' || trimmed.toLowerCase() === 'null' ? PLACEHOLDER : trimmed;
}

/**
 * One row per acquisition; a report without acquisitions still gets one row
 * carrying its report-level fields.
 */
export function buildDoseSheetRows(
  reports: readonly DoseReport[],
): SpreadsheetCell[][] {
  const header = DOSE_SHEET_COLUMNS.map((column) => column.header);
  const rows = reports.flatMap((report) => {
    const acquisitions: ReadonlyArray<Acquisition | null> =
      report.acquisitions.length > 0 ? report.acquisitions : [null];
    return acquisitions.map((acquisition) =>
      DOSE_SHEET_COLUMNS.map((column) =>
        toCell(column.value(report, acquisition)),
      ),
    );
  });
  return [header, ...rows];
}

export function buildDoseSheet(reports: readonly DoseReport[]): SpreadsheetSheet {
  return {
    name: DOSE_SHEET_NAME,
    rows: buildDoseSheetRows(reports),
    columnWidths: DOSE_SHEET_COLUMNS.map((column) => column.width),
  };
}
