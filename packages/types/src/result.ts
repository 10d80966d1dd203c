/**
 * Import Result Types
 *
 * Structured outcome of importing one statement file or a batch of them.
 * These are the values the engine returns; the JSON report shape is only
 * produced at the report boundary.
 */

// =============================================================================
// Status
// =============================================================================

/**
 * Overall status of an import.
 *
 * - success: nothing failed
 * - warning: something failed, something else got through
 * - error:   nothing got through
 */
export type ImportStatus = "success" | "warning" | "error";

// =============================================================================
// Transaction Outcomes
// =============================================================================

interface OutcomeBase {
  readonly identity: string;
  readonly documentNumber: string;
  readonly amount: number;
  readonly date: string;
}

/** The transaction was written to the ledger and confirmed. */
export interface ImportedOutcome extends OutcomeBase {
  readonly kind: "imported";
}

/** The ledger already holds the transaction; nothing was written. */
export interface SkippedOutcome extends OutcomeBase {
  readonly kind: "skipped";
  readonly reason: string;
}

/** The transaction could not be recorded. */
export interface FailedOutcome extends OutcomeBase {
  readonly kind: "failed";
  readonly reason: string;
}

export type TransactionOutcome = ImportedOutcome | SkippedOutcome | FailedOutcome;

// =============================================================================
// Metrics
// =============================================================================

export interface ImportMetrics {
  readonly totalTransactions: number;
  readonly importedCount: number;
  readonly errorCount: number;
  readonly skippedCount: number;
  readonly processingTimeSeconds: number;
}

export interface BatchMetrics extends ImportMetrics {
  readonly totalFiles: number;
  readonly processedFiles: number;
  readonly failedFiles: number;
}

// =============================================================================
// Results
// =============================================================================

interface ResultBase<TMetrics extends ImportMetrics> {
  readonly status: ImportStatus;
  readonly message: string;
  /** ISO-8601, stamped after all work finished */
  readonly timestamp: string;
  readonly metrics: TMetrics;
  readonly imported: readonly ImportedOutcome[];
  readonly failed: readonly FailedOutcome[];
  readonly skipped: readonly SkippedOutcome[];
}

/** Result of importing a single statement file. */
export interface ImportResult extends ResultBase<ImportMetrics> {
  readonly kind: "file";
  readonly filePath: string;
}

/** A file of the batch whose own status was not `error`. */
export interface ProcessedFileSummary {
  readonly filePath: string;
  readonly transactionCount: number;
  readonly status: ImportStatus;
}

/** A file of the batch that failed as a whole. */
export interface FailedFileSummary {
  readonly filePath: string;
  readonly error: string;
}

/** Consolidated result of importing several files. */
export interface BatchResult extends ResultBase<BatchMetrics> {
  readonly kind: "batch";
  readonly filePaths: readonly string[];
  readonly processedFiles: readonly ProcessedFileSummary[];
  readonly failedFiles: readonly FailedFileSummary[];
}

export type AnyImportResult = ImportResult | BatchResult;
