import path from "node:path";
import { ValidationError } from "./errors";
import { DEFAULT_TOLERANCE } from "./harness";

export interface ArcDistanceConfig {
  casesPath: string;
  tolerance: number;
  verbose: boolean;
}

type Env = Record<string, string | undefined>;

export function defaultCasesPath(cwd = process.cwd()): string {
  return path.join(cwd, "data", "regression-cases.json");
}

function parseFlag(value: string | undefined): boolean {
  if (value === undefined) {
    return false;
  }

  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function parseTolerance(value: string | undefined): number {
  if (value === undefined || !value.trim()) {
    return DEFAULT_TOLERANCE;
  }

  const parsed = Number(value.trim());
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new ValidationError("invalid_tolerance", `ARC_TOLERANCE must be a finite non-negative number, got "${value}".`);
  }

  return parsed;
}

export function readArcDistanceConfig(env: Env = process.env, cwd = process.cwd()): ArcDistanceConfig {
  const casesPath = env.ARC_CASES_PATH?.trim();

  return {
    casesPath: casesPath ? path.resolve(cwd, casesPath) : defaultCasesPath(cwd),
    tolerance: parseTolerance(env.ARC_TOLERANCE),
    verbose: parseFlag(env.ARC_VERBOSE),
  };
}
