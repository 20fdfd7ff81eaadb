import { afterEach, describe, expect, test } from "vitest";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { RegressionCaseStore, formatCaseLabel, loadCaseTable, parseCaseTable } from "./cases";
import { CaseTableError, ValidationError } from "./errors";

const TEST_DIR = path.join(process.cwd(), "tmp", "regression-case-tests");

afterEach(async () => {
  await rm(TEST_DIR, { recursive: true, force: true });
});

describe("formatCaseLabel", () => {
  test("labels a case by its inputs", () => {
    expect(formatCaseLabel({ a: -10, b: 10 })).toBe("a=-10, b=10");
  });

  test("appends the note when present", () => {
    expect(formatCaseLabel({ a: 1, b: 359, note: "boundary" })).toBe("a=1, b=359 (boundary)");
  });
});

describe("parseCaseTable", () => {
  test("derives labels and normalizes notes", () => {
    const table = parseCaseTable({
      version: 1,
      cases: [
        { id: "case-1", a: 10, b: 90, expected: 80, addedAtMs: 1, note: "  small  " },
        { id: "case-2", a: 0, b: 270, expected: 90, addedAtMs: 2, note: "   " },
      ],
    });

    expect(table.cases).toEqual([
      { id: "case-1", label: "a=10, b=90 (small)", a: 10, b: 90, expected: 80, note: "small", addedAtMs: 1 },
      { id: "case-2", label: "a=0, b=270", a: 0, b: 270, expected: 90, note: undefined, addedAtMs: 2 },
    ]);
  });

  test("rejects unsupported versions", () => {
    expect(() => parseCaseTable({ version: 2, cases: [] })).toThrow(CaseTableError);
    expect(() => parseCaseTable([])).toThrow("Case table must be an object with version 1 and a cases array.");
  });

  test("rejects rows with non-numeric values", () => {
    expect(() =>
      parseCaseTable({ version: 1, cases: [{ id: "case-1", a: "10", b: 90, expected: 80, addedAtMs: 1 }] }),
    ).toThrow("Case case-1 must have finite numeric a, b and expected values.");
  });

  test("rejects repeated ids", () => {
    const row = { id: "case-1", a: 10, b: 90, expected: 80, addedAtMs: 1 };

    expect(() => parseCaseTable({ version: 1, cases: [row, { ...row, a: 11 }] })).toThrow(
      "Case id case-1 appears more than once.",
    );
  });
});

describe("loadCaseTable", () => {
  test("treats a missing file as an empty table", async () => {
    expect(await loadCaseTable(path.join(TEST_DIR, "missing.json"))).toEqual({ version: 1, cases: [] });
  });

  test("reports malformed JSON", async () => {
    const filePath = path.join(TEST_DIR, "broken.json");
    await mkdir(TEST_DIR, { recursive: true });
    await writeFile(filePath, "{not json", "utf8");

    await expect(loadCaseTable(filePath)).rejects.toMatchObject({ code: "malformed_case_table" });
  });
});

describe("RegressionCaseStore", () => {
  test("appends cases with sequential ids", async () => {
    let now = 1_700_000_000_000;
    const store = new RegressionCaseStore(path.join(TEST_DIR, "cases.json"), () => now);

    const first = await store.add({ a: 1, b: 359, expected: 2, note: " boundary " });
    now += 10;
    const second = await store.add({ a: -10, b: 10, expected: 20 });

    expect(first).toEqual({
      id: "case-1",
      label: "a=1, b=359 (boundary)",
      a: 1,
      b: 359,
      expected: 2,
      note: "boundary",
      addedAtMs: 1_700_000_000_000,
    });
    expect(second.id).toBe("case-2");
    expect(second.addedAtMs).toBe(1_700_000_000_010);
    expect((await store.list()).map(entry => entry.id)).toEqual(["case-1", "case-2"]);
  });

  test("writes rows without derived labels", async () => {
    const filePath = path.join(TEST_DIR, "cases.json");
    const store = new RegressionCaseStore(filePath, () => 42);
    await store.add({ a: 720, b: 270, expected: 90 });

    const written = JSON.parse(await readFile(filePath, "utf8"));

    expect(written).toEqual({
      version: 1,
      cases: [{ id: "case-1", a: 720, b: 270, expected: 90, addedAtMs: 42 }],
    });
  });

  test("rejects a second case for the same input pair", async () => {
    const store = new RegressionCaseStore(path.join(TEST_DIR, "cases.json"));
    await store.add({ a: 1, b: 359, expected: 2 });

    await expect(store.add({ a: 1, b: 359, expected: 3 })).rejects.toMatchObject({
      code: "duplicate_case",
      message: "A case for a=1, b=359 already exists (case-1).",
    });
    expect(await store.list()).toHaveLength(1);
  });

  test("rejects expectations outside [0, 180]", async () => {
    const store = new RegressionCaseStore(path.join(TEST_DIR, "cases.json"));

    await expect(store.add({ a: 0, b: 200, expected: 200 })).rejects.toBeInstanceOf(ValidationError);
    expect(await store.list()).toEqual([]);
  });

  test("rejects non-finite inputs", async () => {
    const store = new RegressionCaseStore(path.join(TEST_DIR, "cases.json"));

    await expect(store.add({ a: Number.NaN, b: 0, expected: 0 })).rejects.toMatchObject({ code: "non_finite_angle" });
  });

  test("serializes concurrent appends", async () => {
    const store = new RegressionCaseStore(path.join(TEST_DIR, "cases.json"));

    const [first, second] = await Promise.all([
      store.add({ a: 10, b: 90, expected: 80 }),
      store.add({ a: 0, b: 270, expected: 90 }),
    ]);

    expect(first.id).toBe("case-1");
    expect(second.id).toBe("case-2");
    expect(await store.list()).toHaveLength(2);
  });

  test("keeps appending after a rejected add", async () => {
    const store = new RegressionCaseStore(path.join(TEST_DIR, "cases.json"));

    await expect(store.add({ a: 0, b: 0, expected: -1 })).rejects.toMatchObject({ code: "invalid_expected" });
    const entry = await store.add({ a: 0, b: 0, expected: 0 });

    expect(entry.id).toBe("case-1");
  });
});
