/**
 * @bank-import/types — Shared domain types for the statement importer.
 *
 * These types are used across all bank-import packages:
 * - Parsed statement records (parser output)
 * - Ledger movements (importer output)
 * - Transaction outcomes, file and batch results
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Statement types
export type {
  ParsedTransaction,
  ParsedStatement,
} from "./transaction.js";

// Movement types
export type {
  MovementDirection,
  Counterparty,
  LedgerMovement,
} from "./movement.js";

// Result types
export type {
  ImportStatus,
  ImportedOutcome,
  SkippedOutcome,
  FailedOutcome,
  TransactionOutcome,
  ImportMetrics,
  BatchMetrics,
  ImportResult,
  ProcessedFileSummary,
  FailedFileSummary,
  BatchResult,
  AnyImportResult,
} from "./result.js";

// Runtime type guards
export {
  isParsedTransaction,
  isMovementDirection,
  isImportStatus,
  isTransactionOutcome,
  isImportResult,
  isBatchResult,
} from "./guards.js";
