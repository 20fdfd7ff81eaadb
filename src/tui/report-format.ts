import type { CaseOutcome, PropertyViolation } from "../lib/arc-distance";

function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(9)));
}

export function formatOutcomeLine(outcome: CaseOutcome): string {
  const prefix = `${outcome.case.id} ${outcome.case.label}`;

  switch (outcome.kind) {
    case "pass":
      return `PASS  ${prefix}: ${formatNumber(outcome.actual)}`;
    case "mismatch":
      return `FAIL  ${prefix}: expected ${formatNumber(outcome.case.expected)}, got ${formatNumber(outcome.actual)} (off by ${formatNumber(outcome.delta)})`;
    case "error":
      return `ERROR ${prefix}: ${outcome.error}`;
  }
}

export function formatViolationLine(violation: PropertyViolation): string {
  return `[${violation.property}] ${violation.detail}`;
}

export function formatMeasurement(a: number, b: number, distance: number, delta: number): string {
  const direction = delta === 0 ? "no turn" : delta > 0 ? "counter-clockwise" : "clockwise";
  return `distance(${formatNumber(a)}, ${formatNumber(b)}) = ${formatNumber(distance)}; shortest turn ${formatNumber(delta)} (${direction})`;
}
