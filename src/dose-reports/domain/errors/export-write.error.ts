/**
 * One export artifact (a JSON file or the spreadsheet) could not be written.
 * In-memory results and the other artifacts are unaffected.
 */
export class ExportWriteError extends Error {
  readonly targetPath: string;

  readonly timestamp: string;

  constructor(params: { targetPath: string; reason: string; cause?: unknown }) {
    super(`Unable to write ${params.targetPath}: ${params.reason}`, {
      cause: params.cause,
    });
    this.name = 'ExportWriteError';
    this.targetPath = params.targetPath;
    this.timestamp = new Date().toISOString();

    Object.setPrototypeOf(this, ExportWriteError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      targetPath: this.targetPath,
      message: this.message,
      timestamp: this.timestamp,
    };
  }
}
