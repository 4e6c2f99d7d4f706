/**
 * Structured validation issue (field-level detail)
 */
export interface ValidationIssue {
  readonly field: string;
  readonly message: string;
  readonly code: string;
  readonly value?: unknown;
}
