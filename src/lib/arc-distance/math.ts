import { FULL_TURN_DEGREES, HALF_TURN_DEGREES, type Degrees } from "./types";
import { parseAngle } from "./validation";

/** Remainder that keeps the sign of the divisor, unlike `%`. */
export function modulo(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}

export function canonicalDegrees(degrees: Degrees): Degrees {
  return modulo(degrees, FULL_TURN_DEGREES);
}

export function normalizeDegrees(degrees: Degrees): Degrees {
  return modulo(degrees + HALF_TURN_DEGREES, FULL_TURN_DEGREES) - HALF_TURN_DEGREES;
}

export function normalizeRadians(radians: number): number {
  return modulo(radians + Math.PI, 2 * Math.PI) - Math.PI;
}

export function degreesToRadians(degrees: Degrees): number {
  return (degrees * Math.PI) / HALF_TURN_DEGREES;
}

export function radiansToDegrees(radians: number): Degrees {
  return (radians * HALF_TURN_DEGREES) / Math.PI;
}

/**
 * Shortest separation between two angles on the circle, in [0, 180].
 *
 * Inputs may be negative or larger than a full turn; both are reduced to
 * [0, 360) before differencing, and the larger arc folds back via
 * `min(d, 360 - d)`.
 */
export function angleDistance(a: Degrees, b: Degrees): Degrees {
  const from = canonicalDegrees(parseAngle(a, "a"));
  const to = canonicalDegrees(parseAngle(b, "b"));
  const difference = Math.abs(from - to);

  return Math.min(difference, FULL_TURN_DEGREES - difference);
}

/** Rotation that carries `from` onto `to` along the shorter arc, in [-180, 180). */
export function signedAngleDelta(from: Degrees, to: Degrees): Degrees {
  return normalizeDegrees(canonicalDegrees(parseAngle(to, "to")) - canonicalDegrees(parseAngle(from, "from")));
}

/** Reduces to [0, 2PI) before scaling to degrees. */
export function canonicalRadiansToDegrees(radians: number): Degrees {
  return radiansToDegrees(modulo(radians, 2 * Math.PI));
}

export function angleDistanceRadians(a: number, b: number): number {
  const distance = angleDistance(
    canonicalRadiansToDegrees(parseAngle(a, "a")),
    canonicalRadiansToDegrees(parseAngle(b, "b")),
  );
  return degreesToRadians(distance);
}
