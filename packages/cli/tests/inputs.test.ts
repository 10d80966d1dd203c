/**
 * Tests for inputs.ts — pattern expansion.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { expandInputs } from "../src/inputs.js";

let dir: string;

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), "bank-import-inputs-"));
  mkdirSync(join(dir, "2024"));
  for (const name of ["b.json", "a.json", "notes.txt"]) {
    writeFileSync(join(dir, "2024", name), "{}");
  }
  writeFileSync(join(dir, "c.json"), "{}");
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("expandInputs", () => {
  it("passes plain paths through untouched", async () => {
    expect(await expandInputs(["missing.json", "c.json"], { cwd: dir })).toEqual([
      "missing.json",
      "c.json",
    ]);
  });

  it("expands a glob into sorted matches", async () => {
    expect(await expandInputs(["2024/*.json"], { cwd: dir })).toEqual([
      "2024/a.json",
      "2024/b.json",
    ]);
  });

  it("keeps pattern order across patterns", async () => {
    expect(await expandInputs(["c.json", "2024/*.json"], { cwd: dir })).toEqual([
      "c.json",
      "2024/a.json",
      "2024/b.json",
    ]);
  });

  it("keeps a pattern without matches as written", async () => {
    expect(await expandInputs(["2023/*.json"], { cwd: dir })).toEqual(["2023/*.json"]);
  });
});
