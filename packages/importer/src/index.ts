/**
 * @bank-import/importer — Idempotent bank statement import engine.
 *
 * Records each parsed bank transaction in the accounting ledger at most
 * once, and reports what happened:
 * - Identity: `ABO_<document>_<account>`, wrapped in `#…#` in the note
 * - Duplicate check: note lookup through an isolated ledger client
 * - Mapping: parsed transaction → ledger movement
 * - Engine: one file, transaction by transaction
 * - Batch: many files, consolidated
 * - Report: the external JSON report document
 */

// Engine
export {
  ImportEngine,
  classifyStatus,
  summaryMessage,
  elapsedSeconds,
  DUPLICATE_REASON,
  COMMIT_FAILED_REASON,
} from "./import-engine.js";

// Batch
export {
  BatchImporter,
  addMetrics,
  classifyBatchStatus,
  batchMessage,
} from "./batch-importer.js";

// Building blocks
export { transactionIdentity, wrapIdentity, extractIdentity } from "./identity.js";
export { DuplicateChecker } from "./duplicate-checker.js";
export {
  mapTransaction,
  movementDirection,
  buildDescription,
  buildInternalNote,
  resolveTransactionDate,
  localDate,
  DEFAULT_JOB_ID,
  FALLBACK_DESCRIPTION,
} from "./transaction-mapper.js";
export type { MapperOptions } from "./transaction-mapper.js";

// Report
export {
  buildReport,
  serializeReport,
  writeReport,
  importedLine,
  failedLine,
  skippedLine,
  processedFileLine,
  failedFileLine,
  STDOUT_TARGET,
} from "./report.js";
export type {
  ReportDocument,
  ReportArtifacts,
  ReportMetrics,
  SerializeOptions,
  WriteReportOptions,
} from "./report.js";

// Errors
export { ImportError, errorMessage } from "./errors.js";
export type { ImportErrorCode } from "./errors.js";

// Logging
export { silentLogger } from "./logger.js";

// Types
export type {
  StatementParser,
  FileImporter,
  ImportEngineConfig,
  BatchImporterConfig,
} from "./types.js";
