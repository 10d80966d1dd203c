/**
 * Transaction identity.
 *
 * The identity is the idempotency key of a bank transaction. It is
 * persisted inside the movement's internal note between `#` markers,
 * which is also how a later run finds it again.
 */

import type { ParsedTransaction } from "@bank-import/types";

const IDENTITY_PREFIX = "ABO";
const WRAPPED_IDENTITY = /#([^#]+)#/;

/**
 * Derive the identity of a transaction: `ABO_<document>_<account>`.
 *
 * Empty fields are not rejected; they yield a degenerate but still
 * deterministic identity such as `ABO__`.
 */
export function transactionIdentity(
  tx: Pick<ParsedTransaction, "documentNumber" | "accountNumber">,
): string {
  return `${IDENTITY_PREFIX}_${tx.documentNumber}_${tx.accountNumber}`;
}

export function wrapIdentity(identity: string): string {
  return `#${identity}#`;
}

/**
 * Recover the identity from an internal note, or null if the note
 * carries none.
 */
export function extractIdentity(note: string | null | undefined): string | null {
  if (note === null || note === undefined || note === "") {
    return null;
  }
  const match = WRAPPED_IDENTITY.exec(note);
  return match?.[1] ?? null;
}
