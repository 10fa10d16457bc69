export enum ExtractionStatus {
  PROCESSED = 'PROCESSED', // Rendered and assembled
  FAILED = 'FAILED', // Could not be rendered; batch continued
}
