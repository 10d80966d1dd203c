/**
 * Import Engine
 *
 * Imports one statement file into the ledger, at most once per transaction.
 *
 * Per file:
 *   missing file      → error result, nothing parsed
 *   parser rejection  → error result, nothing imported
 *   parsed            → every transaction, strictly in parse order
 *
 * Per transaction:
 *   identity → duplicate check → map → submit → confirm → outcome
 *
 * A transaction never aborts its file: whatever goes wrong is recorded
 * as a failed outcome and the loop moves on. That includes a duplicate
 * check that could not run.
 *
 * Usage:
 *   const engine = new ImportEngine({ parser, ledger: () => ledger.client(), mapping });
 *   const result = await engine.importFile("statement.json");
 */

import { existsSync } from "node:fs";
import type { Logger } from "pino";
import type { LedgerClientFactory } from "@bank-import/ledger";
import type {
  FailedOutcome,
  ImportedOutcome,
  ImportMetrics,
  ImportResult,
  ImportStatus,
  ParsedStatement,
  ParsedTransaction,
  SkippedOutcome,
  TransactionOutcome,
} from "@bank-import/types";
import { DuplicateChecker } from "./duplicate-checker.js";
import { ImportError, errorMessage } from "./errors.js";
import { transactionIdentity } from "./identity.js";
import { silentLogger } from "./logger.js";
import { mapTransaction, resolveTransactionDate } from "./transaction-mapper.js";
import type { MapperOptions } from "./transaction-mapper.js";
import type { FileImporter, ImportEngineConfig, StatementParser } from "./types.js";

export const DUPLICATE_REASON = "duplicate";
export const COMMIT_FAILED_REASON = "failed to commit";
const UNKNOWN = "unknown";

// =============================================================================
// Status
// =============================================================================

/**
 * Status of an import from its counts.
 *
 * error:   something failed and nothing was imported
 * warning: something failed and something was imported
 * success: nothing failed (all skipped still counts)
 */
export function classifyStatus(importedCount: number, errorCount: number): ImportStatus {
  if (errorCount > 0 && importedCount === 0) return "error";
  if (errorCount > 0) return "warning";
  return "success";
}

export function summaryMessage(
  status: ImportStatus,
  counts: Pick<ImportMetrics, "importedCount" | "errorCount" | "skippedCount">,
): string {
  const tally =
    `${counts.importedCount} imported, ${counts.errorCount} errors, ${counts.skippedCount} skipped`;
  switch (status) {
    case "error":
      return `Import failed: ${tally}`;
    case "warning":
      return `Import completed with issues: ${tally}`;
    case "success":
      return `Import successful: ${tally}`;
  }
}

/** Seconds between two instants, at millisecond precision. */
export function elapsedSeconds(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / 1000;
}

// =============================================================================
// Engine
// =============================================================================

export class ImportEngine implements FileImporter {
  private readonly parser: StatementParser;
  private readonly openClient: LedgerClientFactory;
  private readonly checker: DuplicateChecker;
  private readonly mapping: MapperOptions;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly fileExists: (filePath: string) => boolean;

  constructor(config: ImportEngineConfig) {
    this.parser = config.parser;
    this.openClient = config.ledger;
    this.logger = config.logger ?? silentLogger();
    this.now = config.now ?? (() => new Date());
    this.fileExists = config.fileExists ?? existsSync;
    this.mapping = { ...config.mapping, now: this.now };
    this.checker = new DuplicateChecker(config.ledger, this.logger);
  }

  async importFile(filePath: string): Promise<ImportResult> {
    const startedAt = this.now();
    const log = this.logger.child({ filePath });
    log.info("Starting statement import");

    if (!this.fileExists(filePath)) {
      const error = new ImportError("INPUT_NOT_FOUND", `Statement file not found: ${filePath}`);
      log.error({ code: error.code }, error.message);
      return this.fileFailure(filePath, error, startedAt);
    }

    let statement: ParsedStatement;
    try {
      statement = await this.parser.parse(filePath);
    } catch (cause) {
      const error = new ImportError(
        "PARSE_FAILURE",
        `Fatal error during import: ${errorMessage(cause)}`,
        { cause },
      );
      log.error({ code: error.code }, error.message);
      return this.fileFailure(filePath, error, startedAt);
    }

    log.info(
      {
        formatVersion: statement.formatVersion,
        statementCount: statement.statements.length,
        transactionCount: statement.transactions.length,
      },
      "Parsed statement file",
    );

    const imported: ImportedOutcome[] = [];
    const failed: FailedOutcome[] = [];
    const skipped: SkippedOutcome[] = [];

    for (const tx of statement.transactions) {
      const outcome = await this.processTransaction(tx, log);
      switch (outcome.kind) {
        case "imported":
          imported.push(outcome);
          break;
        case "failed":
          failed.push(outcome);
          break;
        case "skipped":
          skipped.push(outcome);
          break;
      }
    }

    const counts = {
      importedCount: imported.length,
      errorCount: failed.length,
      skippedCount: skipped.length,
    };
    const status = classifyStatus(counts.importedCount, counts.errorCount);
    const message = summaryMessage(status, counts);
    const finishedAt = this.now();

    if (status === "error") {
      log.error(counts, message);
    } else {
      log.info(counts, message);
    }

    return {
      kind: "file",
      status,
      message,
      timestamp: finishedAt.toISOString(),
      filePath,
      metrics: {
        totalTransactions: statement.transactions.length,
        ...counts,
        processingTimeSeconds: elapsedSeconds(startedAt, finishedAt),
      },
      imported,
      failed,
      skipped,
    };
  }

  // ===========================================================================
  // Per-transaction processing
  // ===========================================================================

  private async processTransaction(
    tx: ParsedTransaction,
    log: Logger,
  ): Promise<TransactionOutcome> {
    let identity = UNKNOWN;
    let date = "";
    const documentNumber = tx.documentNumber;

    try {
      identity = transactionIdentity(tx);
      date = resolveTransactionDate(tx, this.now);
      const base = { identity, documentNumber, amount: tx.amount, date };

      if (await this.checker.exists(identity)) {
        log.info({ identity }, `Transaction already exists, skipping: ${documentNumber}`);
        return { kind: "skipped", ...base, reason: DUPLICATE_REASON };
      }

      const movement = mapTransaction(tx, this.mapping);
      const writer = this.openClient();
      const receipt = await writer.submit(movement);
      const committed = receipt !== null && (await writer.confirm());

      if (committed) {
        log.info(
          { identity, direction: movement.direction, amount: movement.amount },
          `Imported transaction: ${documentNumber}`,
        );
        return { kind: "imported", ...base };
      }

      const error = new ImportError("SUBMISSION_FAILURE", COMMIT_FAILED_REASON);
      log.warn({ identity, code: error.code }, `Failed to import transaction: ${documentNumber}`);
      return { kind: "failed", ...base, reason: error.message };
    } catch (error) {
      const code = error instanceof ImportError ? error.code : "TRANSACTION_EXCEPTION";
      const reason = errorMessage(error);
      log.error({ identity, code }, `Error importing transaction ${documentNumber}: ${reason}`);
      return { kind: "failed", identity, documentNumber, amount: tx.amount, date, reason };
    }
  }

  private fileFailure(filePath: string, error: ImportError, startedAt: Date): ImportResult {
    const finishedAt = this.now();
    return {
      kind: "file",
      status: "error",
      message: error.message,
      timestamp: finishedAt.toISOString(),
      filePath,
      metrics: {
        totalTransactions: 0,
        importedCount: 0,
        errorCount: 0,
        skippedCount: 0,
        processingTimeSeconds: elapsedSeconds(startedAt, finishedAt),
      },
      imported: [],
      failed: [],
      skipped: [],
    };
  }
}
