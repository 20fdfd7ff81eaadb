import { RegressionCaseStore } from "./cases";
import { readArcDistanceConfig } from "./config";
import type { ArcDistanceDependencies } from "./contracts";
import { checkInvariants, runCase, runCases } from "./harness";
import { angleDistance, canonicalRadiansToDegrees, degreesToRadians, signedAngleDelta } from "./math";
import type {
  AngleUnit,
  CaseRunReport,
  Degrees,
  PropertyViolation,
  RecordedCaseResult,
  RegressionCaseInput,
} from "./types";
import { parseAngle } from "./validation";

function toDegrees(value: number, unit: AngleUnit, name: string): Degrees {
  const checked = parseAngle(value, name);
  return unit === "deg" ? checked : canonicalRadiansToDegrees(checked);
}

function fromDegrees(value: Degrees, unit: AngleUnit): number {
  return unit === "deg" ? value : degreesToRadians(value);
}

export class ArcDistanceService {
  constructor(private readonly deps: ArcDistanceDependencies) {}

  measure(a: number, b: number, unit: AngleUnit = "deg"): number {
    return fromDegrees(this.deps.subject(toDegrees(a, unit, "a"), toDegrees(b, unit, "b")), unit);
  }

  signedDelta(from: number, to: number, unit: AngleUnit = "deg"): number {
    return fromDegrees(signedAngleDelta(toDegrees(from, unit, "from"), toDegrees(to, unit, "to")), unit);
  }

  async verifyRegressionCases(): Promise<CaseRunReport> {
    const cases = await this.deps.caseStore.list();
    return runCases(this.deps.subject, cases, { tolerance: this.deps.tolerance });
  }

  verifyInvariants(samples?: readonly Degrees[]): PropertyViolation[] {
    return checkInvariants(this.deps.subject, samples, { tolerance: this.deps.tolerance });
  }

  /** Appends the case whether or not it currently passes; a failing row is the point. */
  async recordRegressionCase(input: RegressionCaseInput): Promise<RecordedCaseResult> {
    const entry = await this.deps.caseStore.add(input);
    return {
      entry,
      outcome: runCase(this.deps.subject, entry, this.deps.tolerance),
    };
  }
}

export function createArcDistanceService(dependencies?: Partial<ArcDistanceDependencies>): ArcDistanceService {
  const config = readArcDistanceConfig();
  return new ArcDistanceService({
    caseStore: new RegressionCaseStore(config.casesPath),
    subject: angleDistance,
    tolerance: config.tolerance,
    ...dependencies,
  });
}
