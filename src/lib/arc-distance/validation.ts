import { ValidationError } from "./errors";

function describeValue(value: unknown): string {
  if (value === null) {
    return "null";
  }

  if (typeof value === "string") {
    return `string "${value}"`;
  }

  return typeof value;
}

/**
 * Accepts only finite numbers. Strings, booleans and other values are rejected
 * rather than coerced, so `"10"` never silently becomes `10`.
 */
export function parseAngle(value: unknown, name = "angle"): number {
  if (typeof value !== "number") {
    throw new ValidationError("invalid_angle", `${name} must be a number of degrees, got ${describeValue(value)}.`);
  }

  if (!Number.isFinite(value)) {
    throw new ValidationError("non_finite_angle", `${name} must be finite, got ${String(value)}.`);
  }

  return value;
}

export function parseAngleText(text: string, name = "angle"): number {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new ValidationError("empty_angle", `${name} cannot be empty.`);
  }

  const parsed = Number(trimmed);
  if (Number.isNaN(parsed)) {
    throw new ValidationError("invalid_angle", `${name} must be a number of degrees, got "${trimmed}".`);
  }

  return parseAngle(parsed, name);
}
