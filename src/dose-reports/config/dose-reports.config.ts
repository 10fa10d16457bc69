import { registerAs } from '@nestjs/config';
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { DoseReportsConfig } from './dose-reports-config.type';
import validateConfig from '../../utils/validate-config';
import {
  ACQUISITION_MARKER_POLICY_NAMES,
  AcquisitionMarkerPolicyName,
  DEFAULT_ACQUISITION_MARKER_POLICIES,
} from '../domain/patterns/pattern-library';

class EnvironmentVariablesValidator {
  @IsString()
  @IsNotEmpty()
  CT_DOSE_SOURCE_DIR: string = 'ct_reports';

  @IsString()
  @IsNotEmpty()
  CT_DOSE_OUTPUT_DIR: string = 'ct_reports_json';

  @IsString()
  @IsNotEmpty()
  CT_DOSE_AGGREGATE_FILE: string = 'ct_reports_all.json';

  @IsString()
  @IsNotEmpty()
  CT_DOSE_SPREADSHEET_FILE: string = 'ct_dose_report.xlsx';

  @IsBoolean()
  CT_DOSE_DEBUG: boolean = false;

  @IsArray()
  @ArrayNotEmpty()
  @IsIn(ACQUISITION_MARKER_POLICY_NAMES, { each: true })
  CT_DOSE_ACQUISITION_MARKERS: AcquisitionMarkerPolicyName[] = [
    ...DEFAULT_ACQUISITION_MARKER_POLICIES,
  ];

  @IsInt()
  @Min(1)
  @Max(50)
  CT_DOSE_HEADER_SCAN_LINES: number = 5;
}

function isMarkerPolicyName(value: string): value is AcquisitionMarkerPolicyName {
  return ACQUISITION_MARKER_POLICY_NAMES.some((name) => name === value);
}

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export default registerAs<DoseReportsConfig, () => DoseReportsConfig>('doseReports', () => {
  const validatedConfig = validateConfig(
    {
      CT_DOSE_SOURCE_DIR: process.env.CT_DOSE_SOURCE_DIR || 'ct_reports',
      CT_DOSE_OUTPUT_DIR: process.env.CT_DOSE_OUTPUT_DIR || 'ct_reports_json',
      CT_DOSE_AGGREGATE_FILE:
        process.env.CT_DOSE_AGGREGATE_FILE || 'ct_reports_all.json',
      CT_DOSE_SPREADSHEET_FILE:
        process.env.CT_DOSE_SPREADSHEET_FILE || 'ct_dose_report.xlsx',
      CT_DOSE_DEBUG: process.env.CT_DOSE_DEBUG === 'true',
      CT_DOSE_ACQUISITION_MARKERS: splitList(
        process.env.CT_DOSE_ACQUISITION_MARKERS,
      ) ?? [...DEFAULT_ACQUISITION_MARKER_POLICIES],
      CT_DOSE_HEADER_SCAN_LINES: process.env.CT_DOSE_HEADER_SCAN_LINES
        ? Number(process.env.CT_DOSE_HEADER_SCAN_LINES)
        : 5,
    },
    EnvironmentVariablesValidator,
  );

  return {
    sourceDir: validatedConfig.CT_DOSE_SOURCE_DIR,
    outputDir: validatedConfig.CT_DOSE_OUTPUT_DIR,
    aggregateFileName: validatedConfig.CT_DOSE_AGGREGATE_FILE,
    spreadsheetFile: validatedConfig.CT_DOSE_SPREADSHEET_FILE,
    debug: validatedConfig.CT_DOSE_DEBUG,
    acquisitionMarkers:
      validatedConfig.CT_DOSE_ACQUISITION_MARKERS.filter(isMarkerPolicyName),
    headerScanLines: validatedConfig.CT_DOSE_HEADER_SCAN_LINES,
  };
});
