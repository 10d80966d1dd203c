/**
 * Statement Types
 *
 * Records produced by the external statement parser. The importer treats
 * them as read-only input: it never fills in or rewrites a parsed field.
 *
 * Rules:
 * - Dates are calendar dates in ISO form (YYYY-MM-DD)
 * - Amounts are signed: positive = inbound, negative = outbound
 * - Optional text fields may be absent or empty; both mean "not provided"
 */

/**
 * One bank transaction as it appears on a parsed statement.
 */
export interface ParsedTransaction {
  /** Bank document number of the movement */
  readonly documentNumber: string;

  /** Account the statement belongs to */
  readonly accountNumber: string;

  /** Account on the other side of the movement */
  readonly counterAccount?: string | undefined;

  /** Bank code of the counter account, when the format carries it */
  readonly counterBankCode?: string | undefined;

  /** Signed amount in the account currency */
  readonly amount: number;

  /** Date the bank valued the movement */
  readonly valuationDate?: string | undefined;

  /** Due date; used when no valuation date is present */
  readonly dueDate?: string | undefined;

  readonly variableSymbol?: string | undefined;
  readonly constantSymbol?: string | undefined;
  readonly specificSymbol?: string | undefined;

  /** Free text the bank attached to the movement */
  readonly additionalInfo?: string | undefined;

  /** Record type tag from the statement format */
  readonly dataType?: string | undefined;
}

/**
 * Everything the parser extracted from one statement file.
 */
export interface ParsedStatement {
  /** Statement format variant reported by the parser */
  readonly formatVersion: string;

  /** Statement header records (account, period, balances) */
  readonly statements: readonly Readonly<Record<string, unknown>>[];

  /** Transactions in file order */
  readonly transactions: readonly ParsedTransaction[];
}
