import { toErrorMessage } from "./errors";
import {
  FULL_TURN_DEGREES,
  HALF_TURN_DEGREES,
  type AngleSubject,
  type CaseOutcome,
  type CaseRunReport,
  type Degrees,
  type PropertyViolation,
  type RegressionCase,
} from "./types";

export const DEFAULT_TOLERANCE = 1e-9;
export const DEFAULT_PERIODS: readonly number[] = [-2, -1, 1, 3];

// Negatives, values past a full turn and quarter-degree fractions; all exactly
// representable so period shifts stay exact.
export const DEFAULT_INVARIANT_SAMPLES: readonly Degrees[] = [
  -725.5, -360, -190, -10, -0.25, 0, 1, 10, 89.75, 90, 179, 180, 181, 270, 359, 359.5, 360, 720, 1085.25,
];

export interface RunCasesOptions {
  tolerance?: number;
}

export interface CheckInvariantsOptions {
  tolerance?: number;
  periods?: readonly number[];
}

type Evaluation = { ok: true; value: number } | { ok: false; error: string };

function evaluate(subject: AngleSubject, a: Degrees, b: Degrees): Evaluation {
  try {
    return { ok: true, value: subject(a, b) };
  } catch (error) {
    return { ok: false, error: toErrorMessage(error) };
  }
}

function within(actual: number, expected: number, tolerance: number): boolean {
  return Math.abs(actual - expected) <= tolerance;
}

export function runCase(subject: AngleSubject, entry: RegressionCase, tolerance = DEFAULT_TOLERANCE): CaseOutcome {
  const result = evaluate(subject, entry.a, entry.b);
  if (!result.ok) {
    return { kind: "error", case: entry, error: result.error };
  }

  if (within(result.value, entry.expected, tolerance)) {
    return { kind: "pass", case: entry, actual: result.value };
  }

  return {
    kind: "mismatch",
    case: entry,
    actual: result.value,
    delta: Math.abs(result.value - entry.expected),
  };
}

export function runCases(
  subject: AngleSubject,
  cases: readonly RegressionCase[],
  options: RunCasesOptions = {},
): CaseRunReport {
  const tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
  const outcomes = cases.map(entry => runCase(subject, entry, tolerance));

  return {
    total: outcomes.length,
    passed: outcomes.filter(outcome => outcome.kind === "pass").length,
    mismatched: outcomes.filter(outcome => outcome.kind === "mismatch").length,
    errored: outcomes.filter(outcome => outcome.kind === "error").length,
    outcomes,
  };
}

export function summarizeReport(report: Pick<CaseRunReport, "total" | "passed" | "mismatched" | "errored">): string {
  return `${report.passed}/${report.total} passed, ${report.mismatched} mismatched, ${report.errored} errored`;
}

export function checkInvariants(
  subject: AngleSubject,
  samples: readonly Degrees[] = DEFAULT_INVARIANT_SAMPLES,
  options: CheckInvariantsOptions = {},
): PropertyViolation[] {
  const tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
  const periods = options.periods ?? DEFAULT_PERIODS;
  const violations: PropertyViolation[] = [];

  for (const a of samples) {
    const same = evaluate(subject, a, a);
    if (!same.ok || !within(same.value, 0, tolerance)) {
      violations.push({
        property: "identity",
        inputs: [a, a],
        detail: same.ok ? `distance(${a}, ${a}) = ${same.value}, expected 0` : `threw: ${same.error}`,
      });
    }

    const opposite = evaluate(subject, a, a + HALF_TURN_DEGREES);
    if (!opposite.ok || !within(opposite.value, HALF_TURN_DEGREES, tolerance)) {
      violations.push({
        property: "antipodal",
        inputs: [a, a + HALF_TURN_DEGREES],
        detail: opposite.ok
          ? `distance(${a}, ${a + HALF_TURN_DEGREES}) = ${opposite.value}, expected ${HALF_TURN_DEGREES}`
          : `threw: ${opposite.error}`,
      });
    }

    for (const b of samples) {
      const forward = evaluate(subject, a, b);
      if (!forward.ok) {
        violations.push({ property: "range", inputs: [a, b], detail: `threw: ${forward.error}` });
        continue;
      }

      const distance = forward.value;
      if (!(distance >= -tolerance && distance <= HALF_TURN_DEGREES + tolerance)) {
        violations.push({
          property: "range",
          inputs: [a, b],
          detail: `distance(${a}, ${b}) = ${distance} lies outside [0, ${HALF_TURN_DEGREES}]`,
        });
      }

      const backward = evaluate(subject, b, a);
      if (!backward.ok || !within(backward.value, distance, tolerance)) {
        violations.push({
          property: "symmetry",
          inputs: [a, b],
          detail: backward.ok
            ? `distance(${a}, ${b}) = ${distance} but distance(${b}, ${a}) = ${backward.value}`
            : `threw: ${backward.error}`,
        });
      }

      for (const k of periods) {
        const shift = FULL_TURN_DEGREES * k;
        for (const [shiftedA, shiftedB] of [
          [a + shift, b],
          [a, b + shift],
        ] as const) {
          const shifted = evaluate(subject, shiftedA, shiftedB);
          if (!shifted.ok || !within(shifted.value, distance, tolerance)) {
            violations.push({
              property: "periodicity",
              inputs: [shiftedA, shiftedB],
              detail: shifted.ok
                ? `distance(${shiftedA}, ${shiftedB}) = ${shifted.value} but distance(${a}, ${b}) = ${distance}`
                : `threw: ${shifted.error}`,
            });
          }
        }
      }
    }
  }

  return violations;
}
