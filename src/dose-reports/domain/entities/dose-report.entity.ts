/**
 * Structured record assembled from one CT radiation dose report.
 *
 * Every leaf is the verbatim captured text (units kept, e.g. "445.02 mGy.cm")
 * or null when the field was not found. Placeholders only appear at export.
 */
export type FieldValue = string | null;

export interface EssentialIdentifiers {
  readonly patientId: FieldValue;
  readonly studyId: FieldValue;
  readonly accessionNumber: FieldValue;
  readonly studyDate: FieldValue;
  readonly birthDate: FieldValue;
  readonly sex: FieldValue;
}

export interface DeviceInfo {
  readonly observerName: FieldValue;
  readonly manufacturer: FieldValue;
  readonly modelName: FieldValue;
  readonly serialNumber: FieldValue;
  readonly physicalLocation: FieldValue;
}

export interface IrradiationSummary {
  readonly startTime: FieldValue;
  readonly endTime: FieldValue;
  readonly totalEvents: FieldValue;
  readonly totalDlp: FieldValue;
}

export interface AcquisitionParams {
  readonly exposureTime: FieldValue;
  readonly scanningLength: FieldValue;
  readonly nominalSingleCollimation: FieldValue;
  readonly nominalTotalCollimation: FieldValue;
  readonly numXraySources: FieldValue;
  readonly pitchFactor: FieldValue;
}

export interface XraySourceParams {
  readonly identification: FieldValue;
  readonly kvp: FieldValue;
  readonly maxTubeCurrent: FieldValue;
  readonly tubeCurrent: FieldValue;
  readonly exposureTimePerRotation: FieldValue;
}

export interface CtDose {
  readonly meanCtdivol: FieldValue;
  readonly phantomType: FieldValue;
  readonly dlp: FieldValue;
  readonly sizeSpecificDose: FieldValue;
  readonly ctdivolAlertValue: FieldValue;
  readonly waterEquivalentDiameter: FieldValue;
}

export interface Acquisition {
  readonly protocol: FieldValue;
  readonly targetRegion: FieldValue;
  readonly acquisitionType: FieldValue;
  readonly procedureContext: FieldValue;
  readonly irradiationEventUid: FieldValue;
  readonly comment: FieldValue;
  readonly acquisitionParams: AcquisitionParams;
  readonly xraySourceParams: XraySourceParams;
  readonly ctDose: CtDose;
}

export interface ReportHeader {
  readonly hospital: FieldValue;
  readonly reportDate: FieldValue;
}

export interface DoseReport extends ReportHeader {
  readonly essential: EssentialIdentifiers;
  readonly device: DeviceInfo;
  readonly irradiation: IrradiationSummary;
  readonly acquisitions: readonly Acquisition[];
}
