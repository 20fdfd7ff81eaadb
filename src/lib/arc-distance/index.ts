import { createArcDistanceService } from "./service";

export * from "./types";
export * from "./errors";
export * from "./validation";
export * from "./math";
export * from "./cases";
export * from "./harness";
export * from "./config";
export * from "./contracts";
export * from "./service";

const defaultService = createArcDistanceService();

export const measureAngle = defaultService.measure.bind(defaultService);
export const signedDelta = defaultService.signedDelta.bind(defaultService);
export const verifyRegressionCases = defaultService.verifyRegressionCases.bind(defaultService);
export const verifyInvariants = defaultService.verifyInvariants.bind(defaultService);
