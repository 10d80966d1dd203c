/**
 * Transaction mapper tests.
 *
 * Covers:
 * - Direction and magnitude (incl. property-based sign mapping)
 * - Date selection and the current-date fallback
 * - Description order and fallback
 * - Internal note format
 * - Counterparty, symbols and target account omission rules
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import {
  mapTransaction,
  movementDirection,
  buildDescription,
  buildInternalNote,
  resolveTransactionDate,
  localDate,
} from "../src/transaction-mapper.js";
import { MAPPING, NOW, tx } from "./fixtures.js";

const options = { ...MAPPING, now: () => NOW };

// ─── Direction ───────────────────────────────────────────────────────────

describe("direction and amount", () => {
  it("maps a positive amount to a receipt", () => {
    const m = mapTransaction(tx("1", 1000.5), options);
    expect(m.direction).toBe("receipt");
    expect(m.amount).toBe(1000.5);
  });

  it("maps a negative amount to an expense of the same magnitude", () => {
    const m = mapTransaction(tx("1", -42.1), options);
    expect(m.direction).toBe("expense");
    expect(m.amount).toBe(42.1);
  });

  it("maps zero to an expense", () => {
    expect(movementDirection(0)).toBe("expense");
    expect(mapTransaction(tx("1", 0), options).amount).toBe(0);
  });

  it("is a receipt iff the amount is positive, with |amount| submitted", () => {
    fc.assert(
      fc.property(fc.double({ noNaN: true, noDefaultInfinity: true }), (a) => {
        const m = mapTransaction(tx("1", a), options);
        expect(m.direction === "receipt").toBe(a > 0);
        expect(m.amount).toBe(Math.abs(a));
      }),
    );
  });
});

// ─── Dates ───────────────────────────────────────────────────────────────

describe("dates", () => {
  it("prefers the valuation date", () => {
    const m = mapTransaction(tx("1", 5, { valuationDate: "2024-02-01", dueDate: "2024-02-03" }), options);
    expect(m.paymentDate).toBe("2024-02-01");
    expect(m.statementDate).toBe("2024-02-01");
  });

  it("falls back to the due date", () => {
    const m = mapTransaction(tx("1", 5, { valuationDate: undefined, dueDate: "2024-02-03" }), options);
    expect(m.paymentDate).toBe("2024-02-03");
  });

  it("treats an empty valuation date as absent", () => {
    expect(resolveTransactionDate(tx("1", 5, { valuationDate: "", dueDate: "2024-02-03" }))).toBe(
      "2024-02-03",
    );
  });

  it("uses the current date when both dates are absent", () => {
    const m = mapTransaction(tx("1", 5, { valuationDate: undefined }), options);
    expect(m.paymentDate).toBe("2024-06-30");
    expect(m.statementDate).toBe("2024-06-30");
  });

  it("formats local calendar dates with padding", () => {
    expect(localDate(new Date(2024, 0, 5, 23, 59))).toBe("2024-01-05");
  });
});

// ─── Description ─────────────────────────────────────────────────────────

describe("buildDescription", () => {
  it("joins info, counter account and type in that order", () => {
    expect(
      buildDescription(
        tx("1", 5, { dataType: "0", counterAccount: "2900123456", additionalInfo: "Invoice 2024/17" }),
      ),
    ).toBe("Invoice 2024/17 | Counter account: 2900123456 | Type: 0");
  });

  it("skips missing parts", () => {
    expect(buildDescription(tx("1", 5, { dataType: "2" }))).toBe("Type: 2");
  });

  it("uses the fallback when nothing is present", () => {
    expect(buildDescription(tx("1", 5))).toBe("Bank transaction from ABO import");
  });
});

// ─── Internal note ───────────────────────────────────────────────────────

describe("buildInternalNote", () => {
  it("defaults the job id to n/a", () => {
    expect(buildInternalNote("ABO_1_2", MAPPING)).toBe(
      "Automatic Import: bank-import 1.0.0 job n/a #ABO_1_2#",
    );
  });

  it("includes a supplied job id", () => {
    expect(buildInternalNote("ABO_1_2", { ...MAPPING, jobId: "run-7" })).toBe(
      "Automatic Import: bank-import 1.0.0 job run-7 #ABO_1_2#",
    );
  });

  it("strips # from provenance fields", () => {
    expect(buildInternalNote("ABO_1_2", { ...MAPPING, appName: "bank#import", jobId: "#9" })).toBe(
      "Automatic Import: bankimport 1.0.0 job 9 #ABO_1_2#",
    );
  });

  it("is what the mapper writes", () => {
    expect(mapTransaction(tx("77", 5), options).internalNote).toBe(
      "Automatic Import: bank-import 1.0.0 job n/a #ABO_77_123456789#",
    );
  });
});

// ─── Optional blocks ─────────────────────────────────────────────────────

describe("optional fields", () => {
  it("omits the counterparty without a counter account", () => {
    expect(mapTransaction(tx("1", 5), options)).not.toHaveProperty("counterparty");
  });

  it("uses the statement bank code and the info as name", () => {
    const m = mapTransaction(
      tx("1", 5, { counterAccount: "2900123456", counterBankCode: "2010", additionalInfo: "ACME s.r.o." }),
      { ...options, defaultBankCode: "0800" },
    );
    expect(m.counterparty).toEqual({
      accountNumber: "2900123456",
      bankCode: "2010",
      name: "ACME s.r.o.",
    });
  });

  it("falls back to the configured bank code", () => {
    const m = mapTransaction(tx("1", 5, { counterAccount: "2900123456" }), {
      ...options,
      defaultBankCode: "0800",
    });
    expect(m.counterparty).toEqual({ accountNumber: "2900123456", bankCode: "0800" });
  });

  it("omits the bank code when none is known", () => {
    const m = mapTransaction(tx("1", 5, { counterAccount: "2900123456" }), options);
    expect(m.counterparty).toEqual({ accountNumber: "2900123456" });
  });

  it("includes only non-empty symbols", () => {
    const m = mapTransaction(
      tx("1", 5, { variableSymbol: "20240017", constantSymbol: "", specificSymbol: undefined }),
      options,
    );
    expect(m.variableSymbol).toBe("20240017");
    expect(m).not.toHaveProperty("constantSymbol");
    expect(m).not.toHaveProperty("specificSymbol");
  });

  it("includes the target account only when configured", () => {
    expect(mapTransaction(tx("1", 5), options)).not.toHaveProperty("targetAccount");
    expect(mapTransaction(tx("1", 5), { ...options, targetAccount: "BU" }).targetAccount).toBe("BU");
  });

  it("builds the full movement", () => {
    expect(
      mapTransaction(
        tx("0001", -250, {
          counterAccount: "2900123456",
          additionalInfo: "Rent",
          constantSymbol: "0308",
        }),
        { ...options, jobId: "job-1", targetAccount: "BU" },
      ),
    ).toEqual({
      direction: "expense",
      paymentDate: "2024-01-15",
      statementDate: "2024-01-15",
      description: "Rent | Counter account: 2900123456",
      internalNote: "Automatic Import: bank-import 1.0.0 job job-1 #ABO_0001_123456789#",
      amount: 250,
      counterparty: { accountNumber: "2900123456", name: "Rent" },
      constantSymbol: "0308",
      targetAccount: "BU",
    });
  });
});
