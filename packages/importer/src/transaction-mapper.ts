/**
 * Transaction Mapper
 *
 * Translates a parsed bank transaction into the ledger's movement schema.
 *
 * Mapping rules:
 * - Direction: receipt iff amount > 0; zero and negative amounts are expenses
 * - Amount: always the absolute value
 * - Dates: valuation date, else due date, else the clock's current date
 * - Description: info | counter account | type, in that order
 * - Internal note: provenance plus the wrapped identity
 * - Optional blocks are omitted, never sent empty
 */

import type {
  Counterparty,
  LedgerMovement,
  MovementDirection,
  ParsedTransaction,
} from "@bank-import/types";
import { transactionIdentity, wrapIdentity } from "./identity.js";

export const DEFAULT_JOB_ID = "n/a";
export const FALLBACK_DESCRIPTION = "Bank transaction from ABO import";
const DESCRIPTION_SEPARATOR = " | ";

export interface MapperOptions {
  /** Application name written into the internal note */
  readonly appName: string;
  /** Application version written into the internal note */
  readonly appVersion: string;
  /** Job / correlation id of this run (default: "n/a") */
  readonly jobId?: string | undefined;
  /** Bank code used when the statement has none for the counter account */
  readonly defaultBankCode?: string | undefined;
  /** Ledger code of the bank account movements are booked to */
  readonly targetAccount?: string | undefined;
  /** Clock for the missing-date fallback (default: system time) */
  readonly now?: (() => Date) | undefined;
}

function present(value: string | undefined): value is string {
  return value !== undefined && value !== "";
}

/** Calendar date of `date` in local time, as YYYY-MM-DD. */
export function localDate(date: Date): string {
  const y = date.getFullYear().toString().padStart(4, "0");
  const m = (date.getMonth() + 1).toString().padStart(2, "0");
  const d = date.getDate().toString().padStart(2, "0");
  return `${y}-${m}-${d}`;
}

/**
 * Date a transaction is booked on.
 *
 * When the statement carries neither a valuation nor a due date, the
 * current date is used.
 */
export function resolveTransactionDate(
  tx: ParsedTransaction,
  now: () => Date = () => new Date(),
): string {
  if (present(tx.valuationDate)) return tx.valuationDate;
  if (present(tx.dueDate)) return tx.dueDate;
  return localDate(now());
}

export function movementDirection(amount: number): MovementDirection {
  return amount > 0 ? "receipt" : "expense";
}

export function buildDescription(tx: ParsedTransaction): string {
  const parts: string[] = [];

  if (present(tx.additionalInfo)) {
    parts.push(tx.additionalInfo);
  }
  if (present(tx.counterAccount)) {
    parts.push(`Counter account: ${tx.counterAccount}`);
  }
  if (present(tx.dataType)) {
    parts.push(`Type: ${tx.dataType}`);
  }

  return parts.length > 0 ? parts.join(DESCRIPTION_SEPARATOR) : FALLBACK_DESCRIPTION;
}

/**
 * Internal note carrying provenance and the wrapped identity.
 *
 * `#` is removed from the provenance fields so the identity is the only
 * marked span in the note.
 */
export function buildInternalNote(identity: string, options: MapperOptions): string {
  const strip = (value: string): string => value.replace(/#/g, "");
  const jobId = options.jobId !== undefined && options.jobId !== "" ? options.jobId : DEFAULT_JOB_ID;
  return (
    `Automatic Import: ${strip(options.appName)} ${strip(options.appVersion)}` +
    ` job ${strip(jobId)} ${wrapIdentity(identity)}`
  );
}

function buildCounterparty(
  tx: ParsedTransaction,
  defaultBankCode: string | undefined,
): Counterparty | undefined {
  if (!present(tx.counterAccount)) {
    return undefined;
  }
  const bankCode = present(tx.counterBankCode) ? tx.counterBankCode : defaultBankCode;
  return {
    accountNumber: tx.counterAccount,
    ...(present(bankCode) ? { bankCode } : {}),
    ...(present(tx.additionalInfo) ? { name: tx.additionalInfo } : {}),
  };
}

/**
 * Map a parsed transaction to a new ledger movement.
 */
export function mapTransaction(tx: ParsedTransaction, options: MapperOptions): LedgerMovement {
  const date = resolveTransactionDate(tx, options.now);
  const counterparty = buildCounterparty(tx, options.defaultBankCode);

  return {
    direction: movementDirection(tx.amount),
    paymentDate: date,
    statementDate: date,
    description: buildDescription(tx),
    internalNote: buildInternalNote(transactionIdentity(tx), options),
    amount: Math.abs(tx.amount),
    ...(counterparty !== undefined ? { counterparty } : {}),
    ...(present(tx.variableSymbol) ? { variableSymbol: tx.variableSymbol } : {}),
    ...(present(tx.constantSymbol) ? { constantSymbol: tx.constantSymbol } : {}),
    ...(present(tx.specificSymbol) ? { specificSymbol: tx.specificSymbol } : {}),
    ...(present(options.targetAccount) ? { targetAccount: options.targetAccount } : {}),
  };
}
