export enum ExportArtifactKind {
  PATIENT_JSON = 'PATIENT_JSON',
  AGGREGATE_JSON = 'AGGREGATE_JSON',
}
