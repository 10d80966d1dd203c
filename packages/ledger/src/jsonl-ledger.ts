/**
 * @bank-import/ledger — File-based JSONL ledger journal.
 *
 * Stores committed movements as one JSON object per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each commit flushes to disk via fsync before returning
 * - Partial writes (torn lines) are detected and skipped on read
 * - The file is the source of truth; nothing is cached between reads
 *
 * Properties:
 * - Append-only: the file is never truncated or rewritten
 * - Every list() re-reads the file, so records committed by an earlier
 *   run are always visible
 *
 * File format:
 * {"id":"...","recordedAt":"...","movement":{...}}
 */

import {
  openSync,
  closeSync,
  appendFileSync,
  fsyncSync,
  fstatSync,
  mkdirSync,
  readSync,
} from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname } from "node:path";
import { isMovementDirection } from "@bank-import/types";
import { StoreClient } from "./client.js";
import type { LedgerClient, LedgerRecord, LedgerStore } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Options for creating a JsonlLedger.
 */
export interface JsonlLedgerOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
  /** Clock for `recordedAt` (default: system time) */
  readonly now?: () => Date;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

/**
 * Minimum shape a journal line must have to be served to clients.
 */
function isLedgerRecord(value: unknown): value is LedgerRecord {
  if (!isObject(value) || !isObject(value.movement)) return false;
  const m = value.movement;
  return (
    typeof value.id === "string" &&
    typeof value.recordedAt === "string" &&
    isMovementDirection(m.direction) &&
    typeof m.amount === "number" &&
    typeof m.paymentDate === "string" &&
    typeof m.statementDate === "string" &&
    typeof m.description === "string" &&
    typeof m.internalNote === "string"
  );
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Whether the file behind `fd` is empty or ends in a newline.
 */
function endsWithNewline(fd: number): boolean {
  const { size } = fstatSync(fd);
  if (size === 0) {
    return true;
  }
  const last = Buffer.alloc(1);
  readSync(fd, last, 0, 1, size - 1);
  return last[0] === 0x0a;
}

export class JsonlLedger implements LedgerStore {
  private readonly _filePath: string;
  private readonly _now: () => Date;

  /**
   * Create a new JsonlLedger.
   *
   * The file is created on first commit.
   * The parent directory is created if it doesn't exist.
   */
  constructor(options: JsonlLedgerOptions) {
    this._filePath = options.filePath;
    this._now = options.now ?? (() => new Date());

    mkdirSync(dirname(this._filePath), { recursive: true });
  }

  /**
   * Open a new client session on this journal.
   */
  client(): LedgerClient {
    return new StoreClient(this, { now: this._now });
  }

  // ─── LedgerStore ────────────────────────────────────────────────────

  /**
   * Read all committed records.
   *
   * A missing file is an empty journal. Any other read error yields
   * `false`: the caller cannot tell what is recorded.
   */
  async readRecords(): Promise<readonly LedgerRecord[] | false> {
    let content: string;
    try {
      content = await readFile(this._filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      return false;
    }

    const records: LedgerRecord[] = [];

    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        // Corrupt or partial line, skip it
        continue;
      }

      if (isLedgerRecord(parsed)) {
        records.push(parsed);
      }
    }

    return records;
  }

  async appendRecords(records: readonly LedgerRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }
    const data = records.map((r) => JSON.stringify(r) + "\n").join("");

    try {
      this._writeAndSync(data);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new LedgerError(
        "JOURNAL_WRITE_FAILED",
        `Failed to append to ledger journal ${this._filePath}: ${reason}`,
      );
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Write data to the JSONL file and fsync for durability.
   *
   * A torn last line (no trailing newline) is terminated first, so the
   * new records start on a line of their own.
   */
  private _writeAndSync(data: string): void {
    const fd = openSync(this._filePath, "a+");
    try {
      const prefix = endsWithNewline(fd) ? "" : "\n";
      appendFileSync(fd, prefix + data, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }
}
