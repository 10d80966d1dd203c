/**
 * Report Generator
 *
 * Renders an import or batch result into the external report document
 * and writes it to a sink.
 *
 * Document shape:
 * {
 *   status, timestamp, message,
 *   artifacts: { imported_transactions?, failed_transactions?,
 *                skipped_transactions?, processed_files?, failed_files? },
 *   metrics: { total_transactions, imported_count, error_count,
 *              skipped_count, processing_time_seconds,
 *              [total_files, processed_files, failed_files] }
 * }
 *
 * Empty artifact lists are left out of the document.
 */

import { rename, rm, writeFile } from "node:fs/promises";
import type {
  AnyImportResult,
  FailedFileSummary,
  FailedOutcome,
  ImportedOutcome,
  ImportStatus,
  ProcessedFileSummary,
  SkippedOutcome,
} from "@bank-import/types";
import { ImportError, errorMessage } from "./errors.js";

// =============================================================================
// Document types
// =============================================================================

export interface ReportArtifacts {
  readonly imported_transactions?: readonly string[];
  readonly failed_transactions?: readonly string[];
  readonly skipped_transactions?: readonly string[];
  readonly processed_files?: readonly string[];
  readonly failed_files?: readonly string[];
}

export interface ReportMetrics {
  readonly total_transactions: number;
  readonly imported_count: number;
  readonly error_count: number;
  readonly skipped_count: number;
  readonly processing_time_seconds: number;
  readonly total_files?: number;
  readonly processed_files?: number;
  readonly failed_files?: number;
}

export interface ReportDocument {
  readonly status: ImportStatus;
  readonly timestamp: string;
  readonly message: string;
  readonly artifacts: ReportArtifacts;
  readonly metrics: ReportMetrics;
}

/** Target meaning "write to standard output". */
export const STDOUT_TARGET = "-";

// =============================================================================
// Line templates
// =============================================================================

export function importedLine(tx: ImportedOutcome): string {
  return `Transaction ${tx.documentNumber}: ${tx.amount} on ${tx.date}`;
}

export function failedLine(tx: FailedOutcome): string {
  return `Failed ${tx.documentNumber}: ${tx.reason}`;
}

export function skippedLine(tx: SkippedOutcome): string {
  return `Skipped ${tx.documentNumber}: ${tx.amount} on ${tx.date} - ${tx.reason}`;
}

export function processedFileLine(file: ProcessedFileSummary): string {
  return `Processed ${file.filePath}: ${file.transactionCount} transactions (${file.status})`;
}

export function failedFileLine(file: FailedFileSummary): string {
  return `Failed ${file.filePath}: ${file.error}`;
}

// =============================================================================
// Build
// =============================================================================

export function buildReport(result: AnyImportResult): ReportDocument {
  const imported = result.imported.map(importedLine);
  const failed = result.failed.map(failedLine);
  const skipped = result.skipped.map(skippedLine);
  const processedFiles = result.kind === "batch" ? result.processedFiles.map(processedFileLine) : [];
  const failedFiles = result.kind === "batch" ? result.failedFiles.map(failedFileLine) : [];

  const artifacts: ReportArtifacts = {
    ...(imported.length > 0 ? { imported_transactions: imported } : {}),
    ...(failed.length > 0 ? { failed_transactions: failed } : {}),
    ...(skipped.length > 0 ? { skipped_transactions: skipped } : {}),
    ...(processedFiles.length > 0 ? { processed_files: processedFiles } : {}),
    ...(failedFiles.length > 0 ? { failed_files: failedFiles } : {}),
  };

  const m = result.metrics;
  const metrics: ReportMetrics = {
    total_transactions: m.totalTransactions,
    imported_count: m.importedCount,
    error_count: m.errorCount,
    skipped_count: m.skippedCount,
    processing_time_seconds: m.processingTimeSeconds,
    ...(result.kind === "batch"
      ? {
          total_files: result.metrics.totalFiles,
          processed_files: result.metrics.processedFiles,
          failed_files: result.metrics.failedFiles,
        }
      : {}),
  };

  return {
    status: result.status,
    timestamp: result.timestamp,
    message: result.message,
    artifacts,
    metrics,
  };
}

// =============================================================================
// Serialize / write
// =============================================================================

export interface SerializeOptions {
  /** Indent the JSON for humans */
  readonly pretty?: boolean | undefined;
}

export function serializeReport(doc: ReportDocument, options: SerializeOptions = {}): string {
  return options.pretty === true ? JSON.stringify(doc, null, 2) : JSON.stringify(doc);
}

export interface WriteReportOptions extends SerializeOptions {
  /** Stream used for the "-" target (default: process.stdout) */
  readonly stdout?: NodeJS.WritableStream | undefined;
}

function writeToStream(stream: NodeJS.WritableStream, text: string): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(text, (error?: Error | null) => {
      if (error) reject(error);
      else resolve();
    });
  });
}

/**
 * Write a report to a file path or, for "-", to stdout.
 *
 * Files are written whole or not at all: the document goes to a
 * temporary sibling first and is renamed into place.
 *
 * @throws {ImportError} REPORT_WRITE_FAILURE
 */
export async function writeReport(
  doc: ReportDocument,
  target: string,
  options: WriteReportOptions = {},
): Promise<void> {
  const text = serializeReport(doc, options);

  if (target === STDOUT_TARGET) {
    try {
      await writeToStream(options.stdout ?? process.stdout, text + "\n");
    } catch (cause) {
      throw new ImportError(
        "REPORT_WRITE_FAILURE",
        `Failed to write report to stdout: ${errorMessage(cause)}`,
        { cause },
      );
    }
    return;
  }

  const tmp = `${target}.${process.pid}.tmp`;
  try {
    await writeFile(tmp, text, "utf-8");
    await rename(tmp, target);
  } catch (cause) {
    // The write failure is what gets reported, not the cleanup
    await rm(tmp, { force: true }).catch(() => undefined);
    throw new ImportError(
      "REPORT_WRITE_FAILURE",
      `Failed to save report to ${target}: ${errorMessage(cause)}`,
      { cause },
    );
  }
}
