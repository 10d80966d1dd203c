/**
 * @bank-import/ledger — Store-backed ledger client.
 *
 * One client = one session: its own issued queries and its own staged
 * movements. Committed records live in the shared LedgerStore.
 */

import { randomUUID } from "node:crypto";
import type { LedgerMovement } from "@bank-import/types";
import { matchesFilter } from "./filter.js";
import type {
  LedgerClient,
  LedgerRecord,
  LedgerStore,
  NoteFilter,
  QueryHandle,
  SubmitReceipt,
} from "./types.js";
import { LedgerError } from "./types.js";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Reasons the ledger refuses a movement, or null if it is acceptable.
 */
export function validateMovement(movement: LedgerMovement): string | null {
  if (!Number.isFinite(movement.amount) || movement.amount < 0) {
    return `invalid amount ${movement.amount}`;
  }
  if (!ISO_DATE.test(movement.paymentDate)) {
    return `invalid payment date "${movement.paymentDate}"`;
  }
  if (!ISO_DATE.test(movement.statementDate)) {
    return `invalid statement date "${movement.statementDate}"`;
  }
  if (movement.internalNote.length === 0) {
    return "empty internal note";
  }
  return null;
}

export interface StoreClientOptions {
  /** Clock for `recordedAt` (default: system time) */
  readonly now?: () => Date;
}

export class StoreClient implements LedgerClient {
  private readonly store: LedgerStore;
  private readonly now: () => Date;
  private readonly queries = new Map<string, QueryHandle>();
  private staged: LedgerMovement[] = [];
  private querySeq = 0;

  constructor(store: LedgerStore, options: StoreClientOptions = {}) {
    this.store = store;
    this.now = options.now ?? (() => new Date());
  }

  query(filter: NoteFilter, label: string): QueryHandle {
    this.querySeq += 1;
    const handle: QueryHandle = { id: `q-${this.querySeq}`, filter, label };
    this.queries.set(handle.id, handle);
    return handle;
  }

  async list(handle: QueryHandle): Promise<readonly LedgerRecord[] | false> {
    const known = this.queries.get(handle.id);
    if (known === undefined || known !== handle) {
      throw new LedgerError(
        "UNKNOWN_QUERY",
        `Query "${handle.id}" was not issued by this client`,
      );
    }

    const records = await this.store.readRecords();
    if (records === false) {
      return false;
    }
    return records.filter((r) => matchesFilter(r.movement, handle.filter));
  }

  async submit(movement: LedgerMovement): Promise<SubmitReceipt | null> {
    if (validateMovement(movement) !== null) {
      return null;
    }
    this.staged.push(movement);
    return { stagedId: `staged-${this.staged.length}` };
  }

  async confirm(): Promise<boolean> {
    const pending = this.staged;
    this.staged = [];

    if (pending.length === 0) {
      return false;
    }

    const recordedAt = this.now().toISOString();
    const records: LedgerRecord[] = pending.map((movement) => ({
      id: randomUUID(),
      movement,
      recordedAt,
    }));

    await this.store.appendRecords(records);
    return true;
  }

  /** Number of staged, unconfirmed movements. */
  get stagedCount(): number {
    return this.staged.length;
  }
}
