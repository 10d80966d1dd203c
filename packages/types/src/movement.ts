/**
 * Ledger Movement Types
 *
 * The record the importer submits to the accounting ledger for one bank
 * transaction. Built fresh per transaction and never mutated.
 */

/** Sign of a movement; the amount itself is always non-negative. */
export type MovementDirection = "receipt" | "expense";

/**
 * The other party of a movement.
 */
export interface Counterparty {
  readonly accountNumber: string;
  readonly bankCode?: string | undefined;
  /** Free-text identification of the counterparty */
  readonly name?: string | undefined;
}

/**
 * One accounting entry representing a single bank transaction.
 *
 * Optional fields are omitted when there is nothing to send; the ledger
 * schema distinguishes an omitted field from an empty one.
 */
export interface LedgerMovement {
  readonly direction: MovementDirection;
  readonly paymentDate: string;
  readonly statementDate: string;
  readonly description: string;

  /**
   * Internal note. Carries the import provenance and the wrapped
   * transaction identity (`#ABO_…#`) used for duplicate detection.
   */
  readonly internalNote: string;

  /** Absolute amount; direction carries the sign */
  readonly amount: number;

  readonly counterparty?: Counterparty | undefined;
  readonly variableSymbol?: string | undefined;
  readonly constantSymbol?: string | undefined;
  readonly specificSymbol?: string | undefined;

  /** Ledger code of the bank account the movement is booked to */
  readonly targetAccount?: string | undefined;
}
