/**
 * @bank-import/ledger — In-memory ledger.
 *
 * Holds committed movements in process. Used for tests and dry runs,
 * where nothing should outlive the invocation.
 */

import { randomUUID } from "node:crypto";
import type { LedgerMovement } from "@bank-import/types";
import { StoreClient } from "./client.js";
import type { LedgerClient, LedgerRecord, LedgerStore } from "./types.js";

export interface InMemoryLedgerOptions {
  /** Clock for `recordedAt` (default: system time) */
  readonly now?: () => Date;
}

export class InMemoryLedger implements LedgerStore {
  private readonly _records: LedgerRecord[] = [];
  private readonly _now: () => Date;

  constructor(options: InMemoryLedgerOptions = {}) {
    this._now = options.now ?? (() => new Date());
  }

  /**
   * Open a new client session on this ledger.
   */
  client(): LedgerClient {
    return new StoreClient(this, { now: this._now });
  }

  /**
   * Record movements directly, bypassing submit/confirm.
   * Useful for preparing an existing ledger state.
   */
  seed(movements: readonly LedgerMovement[]): void {
    const recordedAt = this._now().toISOString();
    for (const movement of movements) {
      this._records.push({ id: randomUUID(), movement, recordedAt });
    }
  }

  /** Committed records in commit order. */
  records(): readonly LedgerRecord[] {
    return [...this._records];
  }

  async readRecords(): Promise<readonly LedgerRecord[] | false> {
    return [...this._records];
  }

  async appendRecords(records: readonly LedgerRecord[]): Promise<void> {
    this._records.push(...records);
  }
}
