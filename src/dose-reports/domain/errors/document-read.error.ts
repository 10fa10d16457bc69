/**
 * A source document could not be rendered to text (missing, unreadable or
 * not a parsable PDF). Recorded against that document only.
 */
export class DocumentReadError extends Error {
  readonly filePath: string;

  readonly reason: string;

  readonly timestamp: string;

  constructor(params: { filePath: string; reason: string; cause?: unknown }) {
    super(`Unable to read ${params.filePath}: ${params.reason}`, {
      cause: params.cause,
    });
    this.name = 'DocumentReadError';
    this.filePath = params.filePath;
    this.reason = params.reason.substring(0, 200);
    this.timestamp = new Date().toISOString();

    Object.setPrototypeOf(this, DocumentReadError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      filePath: this.filePath,
      reason: this.reason,
      timestamp: this.timestamp,
    };
  }
}
