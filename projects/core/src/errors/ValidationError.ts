/**
 * Error codes for request validation errors.
 */
export const ValidationErrorCode = {
  INVALID_REQUEST: "VALIDATION_001",
} as const;

export type ValidationErrorCodeType =
  (typeof ValidationErrorCode)[keyof typeof ValidationErrorCode];

/**
 * A single problem found in an incoming payload.
 */
export interface ValidationIssue {
  /** Dotted path to the offending field, empty for the payload itself. */
  readonly field: string;
  readonly message: string;
}

/**
 * Error thrown when a local request is malformed.
 * Raised before any upstream call is made.
 */
export class ValidationError extends Error {
  readonly code: ValidationErrorCodeType = ValidationErrorCode.INVALID_REQUEST;

  constructor(
    public readonly issues: readonly ValidationIssue[],
    message?: string
  ) {
    super(message ?? ValidationError.summarize(issues));
    this.name = "ValidationError";
  }

  /**
   * Create an error for a single field.
   */
  static forField(field: string, message: string): ValidationError {
    return new ValidationError([{ field, message }]);
  }

  private static summarize(issues: readonly ValidationIssue[]): string {
    if (issues.length === 0) {
      return "Invalid request";
    }
    return `Invalid request: ${issues
      .map((issue) => (issue.field ? `${issue.field}: ${issue.message}` : issue.message))
      .join("; ")}`;
  }
}
