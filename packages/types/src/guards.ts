/**
 * Runtime Type Guards
 *
 * Narrowing functions for import domain types.
 * These enable safe runtime validation at system boundaries
 * (parser output, journal files, deserialized reports).
 */

import type { ParsedTransaction } from "./transaction.js";
import type { MovementDirection } from "./movement.js";
import type {
  BatchResult,
  ImportMetrics,
  ImportResult,
  ImportStatus,
  TransactionOutcome,
} from "./result.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === "string";
}

// =============================================================================
// Statement guards
// =============================================================================

export function isParsedTransaction(value: unknown): value is ParsedTransaction {
  if (!isRecord(value)) return false;
  return (
    typeof value.documentNumber === "string" &&
    typeof value.accountNumber === "string" &&
    typeof value.amount === "number" &&
    Number.isFinite(value.amount) &&
    isOptionalString(value.counterAccount) &&
    isOptionalString(value.counterBankCode) &&
    isOptionalString(value.valuationDate) &&
    isOptionalString(value.dueDate) &&
    isOptionalString(value.variableSymbol) &&
    isOptionalString(value.constantSymbol) &&
    isOptionalString(value.specificSymbol) &&
    isOptionalString(value.additionalInfo) &&
    isOptionalString(value.dataType)
  );
}

// =============================================================================
// Movement guards
// =============================================================================

const DIRECTIONS = new Set<string>(["receipt", "expense"]);

export function isMovementDirection(value: unknown): value is MovementDirection {
  return typeof value === "string" && DIRECTIONS.has(value);
}

// =============================================================================
// Result guards
// =============================================================================

const STATUSES = new Set<string>(["success", "warning", "error"]);
const OUTCOME_KINDS = new Set<string>(["imported", "skipped", "failed"]);

export function isImportStatus(value: unknown): value is ImportStatus {
  return typeof value === "string" && STATUSES.has(value);
}

export function isTransactionOutcome(value: unknown): value is TransactionOutcome {
  if (!isRecord(value)) return false;
  if (typeof value.kind !== "string" || !OUTCOME_KINDS.has(value.kind)) return false;
  const base =
    typeof value.identity === "string" &&
    typeof value.documentNumber === "string" &&
    typeof value.amount === "number" &&
    typeof value.date === "string";
  if (!base) return false;
  return value.kind === "imported" || typeof value.reason === "string";
}

function isImportMetrics(value: unknown): value is ImportMetrics {
  if (!isRecord(value)) return false;
  return (
    typeof value.totalTransactions === "number" &&
    typeof value.importedCount === "number" &&
    typeof value.errorCount === "number" &&
    typeof value.skippedCount === "number" &&
    typeof value.processingTimeSeconds === "number"
  );
}

function hasOutcomeLists(value: Record<string, unknown>): boolean {
  return [value.imported, value.failed, value.skipped].every(
    (list) => Array.isArray(list) && list.every(isTransactionOutcome),
  );
}

export function isImportResult(value: unknown): value is ImportResult {
  if (!isRecord(value)) return false;
  return (
    value.kind === "file" &&
    isImportStatus(value.status) &&
    typeof value.message === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.filePath === "string" &&
    isImportMetrics(value.metrics) &&
    hasOutcomeLists(value)
  );
}

export function isBatchResult(value: unknown): value is BatchResult {
  if (!isRecord(value)) return false;
  if (
    value.kind !== "batch" ||
    !isImportStatus(value.status) ||
    typeof value.message !== "string" ||
    typeof value.timestamp !== "string" ||
    !Array.isArray(value.filePaths) ||
    !Array.isArray(value.processedFiles) ||
    !Array.isArray(value.failedFiles)
  ) {
    return false;
  }
  const metrics = value.metrics;
  return (
    isImportMetrics(metrics) &&
    isRecord(metrics) &&
    typeof metrics.totalFiles === "number" &&
    typeof metrics.processedFiles === "number" &&
    typeof metrics.failedFiles === "number" &&
    hasOutcomeLists(value)
  );
}
