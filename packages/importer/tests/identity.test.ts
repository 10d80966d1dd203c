/**
 * Transaction identity tests.
 *
 * Verifies:
 * - Format and degenerate inputs
 * - Determinism and distinctness (property-based)
 * - Extraction from ledger notes
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { transactionIdentity, wrapIdentity, extractIdentity } from "../src/identity.js";

describe("transactionIdentity", () => {
  it("joins document and account number", () => {
    expect(transactionIdentity({ documentNumber: "0001", accountNumber: "123456789" })).toBe(
      "ABO_0001_123456789",
    );
  });

  it("yields a degenerate identity for empty fields", () => {
    expect(transactionIdentity({ documentNumber: "", accountNumber: "" })).toBe("ABO__");
  });

  it("is deterministic", () => {
    fc.assert(
      fc.property(fc.stringMatching(/^\d{1,12}$/), fc.stringMatching(/^\d{1,16}$/), (doc, acct) => {
        const a = transactionIdentity({ documentNumber: doc, accountNumber: acct });
        const b = transactionIdentity({ documentNumber: doc, accountNumber: acct });
        expect(a).toBe(b);
      }),
    );
  });

  it("differs whenever the pair differs", () => {
    const digits = fc.stringMatching(/^\d{1,8}$/);
    fc.assert(
      fc.property(digits, digits, digits, digits, (d1, a1, d2, a2) => {
        fc.pre(d1 !== d2 || a1 !== a2);
        expect(transactionIdentity({ documentNumber: d1, accountNumber: a1 })).not.toBe(
          transactionIdentity({ documentNumber: d2, accountNumber: a2 }),
        );
      }),
    );
  });
});

describe("wrapIdentity", () => {
  it("adds # markers", () => {
    expect(wrapIdentity("ABO_1_2")).toBe("#ABO_1_2#");
  });

  it("keeps a short identity from matching a longer one", () => {
    expect("note #ABO_11_2#".includes(wrapIdentity("ABO_1_2"))).toBe(false);
    expect("note #ABO_1_22#".includes(wrapIdentity("ABO_1_2"))).toBe(false);
  });
});

describe("extractIdentity", () => {
  it("recovers the identity from a note", () => {
    expect(extractIdentity("Automatic Import: bank-import 1.0.0 job n/a #ABO_5_77#")).toBe(
      "ABO_5_77",
    );
  });

  it("returns null for notes without markers", () => {
    expect(extractIdentity("manual entry")).toBeNull();
  });

  it("returns null for empty and missing notes", () => {
    expect(extractIdentity("")).toBeNull();
    expect(extractIdentity(null)).toBeNull();
    expect(extractIdentity(undefined)).toBeNull();
  });

  it("ignores an empty marker pair", () => {
    expect(extractIdentity("## nothing")).toBeNull();
  });
});
