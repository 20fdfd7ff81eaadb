export type Degrees = number;

export type AngleUnit = "deg" | "rad";

export const FULL_TURN_DEGREES = 360;
export const HALF_TURN_DEGREES = 180;

export type AngleSubject = (a: Degrees, b: Degrees) => number;

export interface RegressionCase {
  id: string;
  label: string;
  a: Degrees;
  b: Degrees;
  expected: Degrees;
  note?: string;
  addedAtMs: number;
}

export interface RegressionCaseInput {
  a: Degrees;
  b: Degrees;
  expected: Degrees;
  note?: string;
}

export interface CaseTableFile {
  version: 1;
  cases: RegressionCase[];
}

export type CaseOutcome =
  | { kind: "pass"; case: RegressionCase; actual: number }
  | { kind: "mismatch"; case: RegressionCase; actual: number; delta: number }
  | { kind: "error"; case: RegressionCase; error: string };

export interface CaseRunReport {
  total: number;
  passed: number;
  mismatched: number;
  errored: number;
  outcomes: CaseOutcome[];
}

export const INVARIANT_NAMES = ["range", "symmetry", "periodicity", "identity", "antipodal"] as const;

export type InvariantName = (typeof INVARIANT_NAMES)[number];

export interface PropertyViolation {
  property: InvariantName;
  inputs: Degrees[];
  detail: string;
}

export interface RecordedCaseResult {
  entry: RegressionCase;
  outcome: CaseOutcome;
}
