/**
 * @bank-import/cli — JSON statement parser.
 *
 * Reads a bank statement that an ABO parser has already turned into JSON:
 *
 * {
 *   "format_version": "...",
 *   "statements": [{ ... }],
 *   "transactions": [{ "document_number": "...", "account_number": "...",
 *                      "amount": 1000.5, "valuation_date": "2024-01-15", ... }]
 * }
 *
 * Optional fields may be missing, null or "". Anything that does not fit
 * the schema rejects the whole file.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { ParsedStatement, ParsedTransaction } from "@bank-import/types";
import type { StatementParser } from "@bank-import/importer";

// =============================================================================
// Schema
// =============================================================================

const optionalText = z
  .string()
  .nullish()
  .transform((v) => (v === null || v === undefined || v === "" ? undefined : v));

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "expected a YYYY-MM-DD date")
  .nullish()
  .or(z.literal(""))
  .transform((v) => (v === null || v === undefined || v === "" ? undefined : v));

const amount = z.union([
  z.number().finite(),
  z
    .string()
    .regex(/^-?\d+(\.\d+)?$/, "expected a decimal amount")
    .transform(Number),
]);

const identifier = z.union([z.string(), z.number().int().nonnegative().transform(String)]);

export const TransactionSchema = z.object({
  document_number: identifier,
  account_number: identifier,
  counter_account: optionalText,
  counter_bank_code: optionalText,
  amount,
  valuation_date: isoDate,
  due_date: isoDate,
  variable_symbol: optionalText,
  constant_symbol: optionalText,
  specific_symbol: optionalText,
  additional_info: optionalText,
  data_type: optionalText,
});

export const StatementFileSchema = z.object({
  format_version: z.string().default("unknown"),
  statements: z.array(z.record(z.unknown())).default([]),
  transactions: z.array(TransactionSchema),
});

type RawTransaction = z.infer<typeof TransactionSchema>;

// =============================================================================
// Mapping
// =============================================================================

function toParsedTransaction(raw: RawTransaction): ParsedTransaction {
  return {
    documentNumber: raw.document_number,
    accountNumber: raw.account_number,
    amount: raw.amount,
    ...(raw.counter_account !== undefined ? { counterAccount: raw.counter_account } : {}),
    ...(raw.counter_bank_code !== undefined ? { counterBankCode: raw.counter_bank_code } : {}),
    ...(raw.valuation_date !== undefined ? { valuationDate: raw.valuation_date } : {}),
    ...(raw.due_date !== undefined ? { dueDate: raw.due_date } : {}),
    ...(raw.variable_symbol !== undefined ? { variableSymbol: raw.variable_symbol } : {}),
    ...(raw.constant_symbol !== undefined ? { constantSymbol: raw.constant_symbol } : {}),
    ...(raw.specific_symbol !== undefined ? { specificSymbol: raw.specific_symbol } : {}),
    ...(raw.additional_info !== undefined ? { additionalInfo: raw.additional_info } : {}),
    ...(raw.data_type !== undefined ? { dataType: raw.data_type } : {}),
  };
}

/**
 * Parse statement JSON text.
 *
 * @throws {Error} if the text is not JSON or does not match the schema
 */
export function parseStatementJson(text: string): ParsedStatement {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new Error(`invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = StatementFileSchema.safeParse(data);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first === undefined ? "" : first.path.join(".");
    throw new Error(`invalid statement at ${where || "<root>"}: ${first?.message ?? "unknown"}`);
  }

  return {
    formatVersion: parsed.data.format_version,
    statements: parsed.data.statements,
    transactions: parsed.data.transactions.map(toParsedTransaction),
  };
}

export class JsonStatementParser implements StatementParser {
  async parse(filePath: string): Promise<ParsedStatement> {
    return parseStatementJson(await readFile(filePath, "utf-8"));
  }
}
