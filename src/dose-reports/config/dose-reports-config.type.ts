import { AcquisitionMarkerPolicyName } from '../domain/patterns/pattern-library';

export type DoseReportsConfig = {
  sourceDir: string; // Folder scanned for *.pdf reports
  outputDir: string; // Per-patient and aggregate JSON land here
  aggregateFileName: string;
  spreadsheetFile: string;
  debug: boolean;
  acquisitionMarkers: AcquisitionMarkerPolicyName[];
  headerScanLines: number; // Lines searched for hospital / report date
};
