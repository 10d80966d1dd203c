/**
 * Shared test fixtures for the importer tests.
 */

import type { ParsedStatement, ParsedTransaction } from "@bank-import/types";
import type { StatementParser } from "../src/types.js";
import type { MapperOptions } from "../src/transaction-mapper.js";

export const MAPPING: Omit<MapperOptions, "now"> = {
  appName: "bank-import",
  appVersion: "1.0.0",
};

export const NOW = new Date(2024, 5, 30, 12, 0, 0);

export function tx(
  documentNumber: string,
  amount: number,
  overrides: Partial<ParsedTransaction> = {},
): ParsedTransaction {
  return {
    documentNumber,
    accountNumber: "123456789",
    amount,
    valuationDate: "2024-01-15",
    ...overrides,
  };
}

export function statement(...transactions: ParsedTransaction[]): ParsedStatement {
  return {
    formatVersion: "test",
    statements: [{ accountNumber: "123456789" }],
    transactions,
  };
}

/**
 * Parser over a fixed set of in-memory statements keyed by path.
 */
export class StaticParser implements StatementParser {
  private readonly statements: Map<string, ParsedStatement>;

  constructor(entries: Record<string, ParsedStatement>) {
    this.statements = new Map(Object.entries(entries));
  }

  has(filePath: string): boolean {
    return this.statements.has(filePath);
  }

  async parse(filePath: string): Promise<ParsedStatement> {
    const found = this.statements.get(filePath);
    if (found === undefined) {
      throw new Error(`no fixture for ${filePath}`);
    }
    return found;
  }
}
