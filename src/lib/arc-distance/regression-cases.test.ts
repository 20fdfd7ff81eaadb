import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { describe, expect, test } from "vitest";
import { parseCaseTable } from "./cases";
import { runCases, summarizeReport } from "./harness";
import { angleDistance } from "./math";

const SEED_PATH = fileURLToPath(new URL("../../../data/regression-cases.json", import.meta.url));
const table = parseCaseTable(JSON.parse(readFileSync(SEED_PATH, "utf8")));

describe("regression case table", () => {
  test.each(table.cases)("$id: $label", entry => {
    expect(angleDistance(entry.a, entry.b)).toBeCloseTo(entry.expected, 9);
  });

  test("still contains every seed scenario", () => {
    const rows = table.cases.map(entry => [entry.a, entry.b, entry.expected]);

    expect(rows).toEqual(
      expect.arrayContaining([
        [10, 90, 80],
        [0, 270, 90],
        [1, 359, 2],
        [720, 270, 90],
        [-10, 10, 20],
        [0, 0, 0],
        [0, 180, 180],
      ]),
    );
  });

  test("numbers cases in the order they were appended", () => {
    expect(table.cases.map(entry => entry.id)).toEqual(table.cases.map((_, index) => `case-${index + 1}`));
  });

  test("passes as a whole through the harness", () => {
    const report = runCases(angleDistance, table.cases);

    expect(summarizeReport(report)).toBe(`${table.cases.length}/${table.cases.length} passed, 0 mismatched, 0 errored`);
  });
});
