/**
 * Note filters.
 *
 * The only lookup the importer needs is "internal note contains X".
 * Kept structured so no caller ever splices values into a query string.
 */

import type { LedgerMovement } from "@bank-import/types";
import type { NoteFilter } from "./types.js";

export function noteContains(value: string): NoteFilter {
  return { field: "internalNote", operator: "contains", value };
}

/**
 * Render a filter the way the ledger's query language spells it.
 * Quotes in the value are doubled.
 */
export function describeFilter(filter: NoteFilter): string {
  const escaped = filter.value.replace(/'/g, "''");
  return `${filter.field} like '%${escaped}%'`;
}

export function matchesFilter(movement: LedgerMovement, filter: NoteFilter): boolean {
  return movement[filter.field].includes(filter.value);
}
