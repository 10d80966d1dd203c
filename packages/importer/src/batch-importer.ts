/**
 * Batch Importer
 *
 * Runs a FileImporter over several statement files, one after another in
 * the order given, and consolidates the per-file results.
 *
 * - Outcome lists are merged file-major, transaction order within a file
 * - Additive metrics are the sum of the per-file metrics
 * - A file whose own status is `error` counts as failed, anything else
 *   (warnings included) as processed
 * - A file that throws is recorded as failed; the batch goes on
 */

import type { Logger } from "pino";
import type {
  BatchMetrics,
  BatchResult,
  FailedFileSummary,
  FailedOutcome,
  ImportedOutcome,
  ImportMetrics,
  ImportResult,
  ImportStatus,
  ProcessedFileSummary,
  SkippedOutcome,
} from "@bank-import/types";
import { errorMessage } from "./errors.js";
import { elapsedSeconds } from "./import-engine.js";
import { silentLogger } from "./logger.js";
import type { BatchImporterConfig, FileImporter } from "./types.js";

const EMPTY_METRICS: ImportMetrics = {
  totalTransactions: 0,
  importedCount: 0,
  errorCount: 0,
  skippedCount: 0,
  processingTimeSeconds: 0,
};

/** Sum of two metric sets. Seconds are kept at millisecond precision. */
export function addMetrics(a: ImportMetrics, b: ImportMetrics): ImportMetrics {
  return {
    totalTransactions: a.totalTransactions + b.totalTransactions,
    importedCount: a.importedCount + b.importedCount,
    errorCount: a.errorCount + b.errorCount,
    skippedCount: a.skippedCount + b.skippedCount,
    processingTimeSeconds:
      Math.round((a.processingTimeSeconds + b.processingTimeSeconds) * 1000) / 1000,
  };
}

/**
 * error: every file failed (or there were none)
 * warning: some files failed
 * success: no file failed
 */
export function classifyBatchStatus(totalFiles: number, failedFiles: number): ImportStatus {
  if (failedFiles === totalFiles) return "error";
  if (failedFiles > 0) return "warning";
  return "success";
}

export function batchMessage(status: ImportStatus, metrics: BatchMetrics): string {
  const tally =
    `${metrics.importedCount} imported, ${metrics.errorCount} errors, ${metrics.skippedCount} skipped`;
  switch (status) {
    case "error":
      return metrics.totalFiles === 0
        ? "Batch import failed: no input files"
        : `Batch import failed: all ${metrics.totalFiles} files failed`;
    case "warning":
      return `Batch import completed with issues: ${metrics.processedFiles} of ${metrics.totalFiles} files processed, ${tally}`;
    case "success":
      return `Batch import successful: ${metrics.totalFiles} files processed, ${tally}`;
  }
}

export class BatchImporter {
  private readonly importer: FileImporter;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(importer: FileImporter, config: BatchImporterConfig = {}) {
    this.importer = importer;
    this.logger = config.logger ?? silentLogger();
    this.now = config.now ?? (() => new Date());
  }

  async importFiles(filePaths: readonly string[]): Promise<BatchResult> {
    const startedAt = this.now();
    this.logger.info({ fileCount: filePaths.length }, "Starting batch import");

    const imported: ImportedOutcome[] = [];
    const failed: FailedOutcome[] = [];
    const skipped: SkippedOutcome[] = [];
    const processedFiles: ProcessedFileSummary[] = [];
    const failedFiles: FailedFileSummary[] = [];
    let totals = EMPTY_METRICS;

    for (const filePath of filePaths) {
      let result: ImportResult;
      try {
        result = await this.importer.importFile(filePath);
      } catch (error) {
        const message = errorMessage(error);
        this.logger.error({ filePath }, `Unhandled error importing file: ${message}`);
        failedFiles.push({ filePath, error: message });
        continue;
      }

      imported.push(...result.imported);
      failed.push(...result.failed);
      skipped.push(...result.skipped);
      totals = addMetrics(totals, result.metrics);

      if (result.status === "error") {
        failedFiles.push({ filePath, error: result.message });
      } else {
        processedFiles.push({
          filePath,
          transactionCount: result.metrics.totalTransactions,
          status: result.status,
        });
      }
    }

    const metrics: BatchMetrics = {
      ...totals,
      totalFiles: filePaths.length,
      processedFiles: processedFiles.length,
      failedFiles: failedFiles.length,
    };
    const status = classifyBatchStatus(metrics.totalFiles, metrics.failedFiles);
    const message = batchMessage(status, metrics);
    const finishedAt = this.now();

    this.logger.info(
      { status, elapsedSeconds: elapsedSeconds(startedAt, finishedAt) },
      message,
    );

    return {
      kind: "batch",
      status,
      message,
      timestamp: finishedAt.toISOString(),
      filePaths: [...filePaths],
      metrics,
      imported,
      failed,
      skipped,
      processedFiles,
      failedFiles,
    };
  }
}
