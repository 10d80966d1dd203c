/**
 * @bank-import/ledger — Ledger collaborator contract.
 *
 * The importer talks to the accounting ledger only through this surface:
 * - query() / list(): look up recorded movements by internal note
 * - submit() / confirm(): stage a movement and commit it
 *
 * Rules:
 * - list() returns `false` when the lookup could not run; an empty array
 *   means the lookup ran and found nothing
 * - submit() only stages; nothing is visible to list() before confirm()
 * - confirm() clears the stage whether or not the commit succeeded
 */

import type { LedgerMovement } from "@bank-import/types";

// ─── Queries ─────────────────────────────────────────────────────────────

/**
 * Substring filter on a movement's internal note.
 * The ledger evaluates it like `internalNote like '%value%'`.
 */
export interface NoteFilter {
  readonly field: "internalNote";
  readonly operator: "contains";
  readonly value: string;
}

/**
 * A prepared query, returned by query() and consumed by list()
 * on the same client.
 */
export interface QueryHandle {
  readonly id: string;
  readonly filter: NoteFilter;
  /** Human-readable label for logs and ledger-side auditing */
  readonly label: string;
}

// ─── Records ─────────────────────────────────────────────────────────────

/**
 * A movement as persisted by the ledger.
 */
export interface LedgerRecord {
  readonly id: string;
  readonly movement: LedgerMovement;
  readonly recordedAt: string;
}

/**
 * Acknowledgement that a movement was staged.
 */
export interface SubmitReceipt {
  readonly stagedId: string;
}

// ─── Client ──────────────────────────────────────────────────────────────

export interface LedgerClient {
  query(filter: NoteFilter, label: string): QueryHandle;
  list(handle: QueryHandle): Promise<readonly LedgerRecord[] | false>;
  /** Returns null when the ledger refuses the movement. */
  submit(movement: LedgerMovement): Promise<SubmitReceipt | null>;
  confirm(): Promise<boolean>;
}

/**
 * Creates an independent client. Each client has its own staged
 * movements and issued queries; clients share only committed records.
 */
export type LedgerClientFactory = () => LedgerClient;

// ─── Storage ─────────────────────────────────────────────────────────────

/**
 * Backing store behind a ledger client.
 */
export interface LedgerStore {
  /** All committed records, or `false` when they cannot be read. */
  readRecords(): Promise<readonly LedgerRecord[] | false>;
  /** Persist records; all or none. */
  appendRecords(records: readonly LedgerRecord[]): Promise<void>;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "UNKNOWN_QUERY"
  | "JOURNAL_WRITE_FAILED";

/**
 * Structured error from a ledger client.
 * Thrown for contract misuse and storage faults, never for
 * "not found" or "rejected" (those are return values).
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
