import { describe, expect, test } from "vitest";
import { readArcDistanceConfig } from "./config";
import { ValidationError } from "./errors";

describe("readArcDistanceConfig", () => {
  test("falls back to defaults", () => {
    expect(readArcDistanceConfig({}, "/work")).toEqual({
      casesPath: "/work/data/regression-cases.json",
      tolerance: 1e-9,
      verbose: false,
    });
  });

  test("resolves the cases path against the working directory", () => {
    expect(readArcDistanceConfig({ ARC_CASES_PATH: "fixtures/cases.json" }, "/work").casesPath).toBe(
      "/work/fixtures/cases.json",
    );
    expect(readArcDistanceConfig({ ARC_CASES_PATH: "/var/cases.json" }, "/work").casesPath).toBe("/var/cases.json");
  });

  test("parses the tolerance", () => {
    expect(readArcDistanceConfig({ ARC_TOLERANCE: "0.001" }, "/work").tolerance).toBe(0.001);
    expect(readArcDistanceConfig({ ARC_TOLERANCE: "0" }, "/work").tolerance).toBe(0);
  });

  test("rejects a tolerance that is not a finite non-negative number", () => {
    expect(() => readArcDistanceConfig({ ARC_TOLERANCE: "abc" }, "/work")).toThrow(ValidationError);
    expect(() => readArcDistanceConfig({ ARC_TOLERANCE: "-1" }, "/work")).toThrow(
      'ARC_TOLERANCE must be a finite non-negative number, got "-1".',
    );
  });

  test("reads the verbose flag", () => {
    expect(readArcDistanceConfig({ ARC_VERBOSE: "TRUE" }, "/work").verbose).toBe(true);
    expect(readArcDistanceConfig({ ARC_VERBOSE: "1" }, "/work").verbose).toBe(true);
    expect(readArcDistanceConfig({ ARC_VERBOSE: "no" }, "/work").verbose).toBe(false);
  });
});
