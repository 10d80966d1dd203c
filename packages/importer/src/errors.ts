/**
 * Import error taxonomy.
 *
 * Each code has a fixed owning scope; an error is caught there and
 * turned into a recorded outcome, never rethrown past it.
 *
 * - INPUT_NOT_FOUND, PARSE_FAILURE → file
 * - DUPLICATE_CHECK_FAILURE, SUBMISSION_FAILURE, TRANSACTION_EXCEPTION → transaction
 * - REPORT_WRITE_FAILURE → process (logged, exit code unchanged)
 */

export type ImportErrorCode =
  | "INPUT_NOT_FOUND"
  | "PARSE_FAILURE"
  | "DUPLICATE_CHECK_FAILURE"
  | "SUBMISSION_FAILURE"
  | "TRANSACTION_EXCEPTION"
  | "REPORT_WRITE_FAILURE";

export class ImportError extends Error {
  public readonly code: ImportErrorCode;

  constructor(code: ImportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ImportError";
    this.code = code;
  }
}

/** Message of any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
