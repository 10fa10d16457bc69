/**
 * Previously exported report JSON is missing or does not have the report shape.
 */
export class ReportInputError extends Error {
  readonly sourcePath: string | null;

  /**
   * Property paths that failed validation, e.g. "0.essential.patient_id"
   */
  readonly violations: readonly string[];

  constructor(params: {
    message: string;
    sourcePath?: string | null;
    violations?: readonly string[];
  }) {
    super(params.message);
    this.name = 'ReportInputError';
    this.sourcePath = params.sourcePath ?? null;
    this.violations = params.violations ?? [];

    Object.setPrototypeOf(this, ReportInputError.prototype);
  }

  withSource(sourcePath: string): ReportInputError {
    return new ReportInputError({
      message: this.message,
      sourcePath,
      violations: this.violations,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      message: this.message,
      sourcePath: this.sourcePath,
      violations: this.violations,
    };
  }
}
