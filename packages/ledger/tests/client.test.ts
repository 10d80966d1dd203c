/**
 * Tests for the store-backed ledger client.
 *
 * Covers:
 * - Staging vs. committing (submit / confirm)
 * - Stage is cleared after confirm, successful or not
 * - Note filter lookups
 * - Session isolation between clients
 * - Movement validation
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import type { LedgerMovement } from "@bank-import/types";
import { InMemoryLedger } from "../src/in-memory-ledger.js";
import { StoreClient, validateMovement } from "../src/client.js";
import { noteContains, describeFilter } from "../src/filter.js";
import { LedgerError } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const NOW = new Date("2024-05-02T09:30:00.000Z");

function movement(identity: string, overrides: Partial<LedgerMovement> = {}): LedgerMovement {
  return {
    direction: "receipt",
    paymentDate: "2024-05-01",
    statementDate: "2024-05-01",
    description: "Invoice 17",
    internalNote: `Automatic Import: bank-import 1.0.0 job n/a #${identity}#`,
    amount: 250,
    ...overrides,
  };
}

let ledger: InMemoryLedger;

beforeEach(() => {
  ledger = new InMemoryLedger({ now: () => NOW });
});

// ─── Submit / Confirm ────────────────────────────────────────────────────

describe("submit and confirm", () => {
  it("stages without committing", async () => {
    const client = ledger.client();
    const receipt = await client.submit(movement("ABO_1_9"));

    expect(receipt).toEqual({ stagedId: "staged-1" });
    expect(ledger.records()).toHaveLength(0);
  });

  it("commits staged movements on confirm", async () => {
    const client = ledger.client();
    await client.submit(movement("ABO_1_9"));

    expect(await client.confirm()).toBe(true);

    const records = ledger.records();
    expect(records).toHaveLength(1);
    expect(records[0]?.movement.internalNote).toContain("#ABO_1_9#");
    expect(records[0]?.recordedAt).toBe("2024-05-02T09:30:00.000Z");
  });

  it("returns false when nothing is staged", async () => {
    expect(await ledger.client().confirm()).toBe(false);
  });

  it("does not commit twice", async () => {
    const client = ledger.client();
    await client.submit(movement("ABO_1_9"));
    await client.confirm();

    expect(await client.confirm()).toBe(false);
    expect(ledger.records()).toHaveLength(1);
  });

  it("clears the stage even when the store fails", async () => {
    const client = new StoreClient(ledger);
    vi.spyOn(ledger, "appendRecords").mockRejectedValueOnce(new Error("disk full"));

    await client.submit(movement("ABO_1_9"));
    await expect(client.confirm()).rejects.toThrow("disk full");
    expect(client.stagedCount).toBe(0);
  });

  it("rejects invalid movements", async () => {
    const client = ledger.client();
    expect(await client.submit(movement("ABO_1_9", { amount: -1 }))).toBeNull();
    expect(await client.confirm()).toBe(false);
  });
});

// ─── Queries ─────────────────────────────────────────────────────────────

describe("query and list", () => {
  it("finds records whose note contains the filter value", async () => {
    ledger.seed([movement("ABO_11_2"), movement("ABO_1_2")]);
    const client = ledger.client();

    const handle = client.query(noteContains("#ABO_1_2#"), "TransactionID: ABO_1_2");
    const found = await client.list(handle);

    expect(found).not.toBe(false);
    expect(found === false ? [] : found.map((r) => r.movement.internalNote)).toEqual([
      "Automatic Import: bank-import 1.0.0 job n/a #ABO_1_2#",
    ]);
  });

  it("returns an empty list when nothing matches", async () => {
    const client = ledger.client();
    const handle = client.query(noteContains("#ABO_5_5#"), "TransactionID: ABO_5_5");
    expect(await client.list(handle)).toEqual([]);
  });

  it("returns false when the store cannot be read", async () => {
    vi.spyOn(ledger, "readRecords").mockResolvedValueOnce(false);
    const client = ledger.client();
    const handle = client.query(noteContains("#ABO_5_5#"), "label");
    expect(await client.list(handle)).toBe(false);
  });

  it("refuses handles issued by another client", async () => {
    const a = ledger.client();
    const b = ledger.client();
    const handle = a.query(noteContains("x"), "label");

    await expect(b.list(handle)).rejects.toBeInstanceOf(LedgerError);
  });

  it("does not see movements staged by another client", async () => {
    const writer = ledger.client();
    const reader = ledger.client();
    await writer.submit(movement("ABO_3_3"));

    const handle = reader.query(noteContains("#ABO_3_3#"), "label");
    expect(await reader.list(handle)).toEqual([]);
  });
});

// ─── Filters ─────────────────────────────────────────────────────────────

describe("describeFilter", () => {
  it("renders a like expression", () => {
    expect(describeFilter(noteContains("#ABO_1_2#"))).toBe(
      "internalNote like '%#ABO_1_2#%'",
    );
  });

  it("doubles single quotes", () => {
    expect(describeFilter(noteContains("O'Neil"))).toBe("internalNote like '%O''Neil%'");
  });
});

// ─── Validation ──────────────────────────────────────────────────────────

describe("validateMovement", () => {
  it("accepts a well-formed movement", () => {
    expect(validateMovement(movement("ABO_1_1"))).toBeNull();
  });

  it("accepts a zero amount", () => {
    expect(validateMovement(movement("ABO_1_1", { amount: 0 }))).toBeNull();
  });

  it("rejects a malformed date", () => {
    expect(validateMovement(movement("ABO_1_1", { paymentDate: "01.05.2024" }))).toBe(
      'invalid payment date "01.05.2024"',
    );
  });

  it("rejects a non-finite amount", () => {
    expect(validateMovement(movement("ABO_1_1", { amount: Number.POSITIVE_INFINITY }))).toBe(
      "invalid amount Infinity",
    );
  });

  it("rejects an empty note", () => {
    expect(validateMovement(movement("ABO_1_1", { internalNote: "" }))).toBe(
      "empty internal note",
    );
  });
});
