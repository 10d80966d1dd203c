/**
 * @bank-import/ledger — Ledger collaborator for the statement importer.
 *
 * Defines the client contract the importer consumes and ships two
 * local implementations:
 * - InMemoryLedger: process-local, for tests and dry runs
 * - JsonlLedger: durable append-only journal file
 */

export { StoreClient, validateMovement } from "./client.js";
export type { StoreClientOptions } from "./client.js";
export { InMemoryLedger } from "./in-memory-ledger.js";
export type { InMemoryLedgerOptions } from "./in-memory-ledger.js";
export { JsonlLedger } from "./jsonl-ledger.js";
export type { JsonlLedgerOptions } from "./jsonl-ledger.js";
export { noteContains, describeFilter, matchesFilter } from "./filter.js";

export type {
  NoteFilter,
  QueryHandle,
  LedgerRecord,
  SubmitReceipt,
  LedgerClient,
  LedgerClientFactory,
  LedgerStore,
  LedgerErrorCode,
} from "./types.js";
export { LedgerError } from "./types.js";
