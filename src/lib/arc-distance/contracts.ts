import type { RegressionCaseStoreLike } from "./cases";
import type { AngleSubject } from "./types";

export interface ArcDistanceDependencies {
  caseStore: RegressionCaseStoreLike;
  subject: AngleSubject;
  tolerance: number;
}
