// Arm Angle Pipeline - Error taxonomy
//
// Only ConfigurationError is thrown across the run; the per-unit classes are
// raised inside a unit step and folded into the run report at the unit
// boundary.

import type { MeasurementVariant, StageName } from "./types.js";

/** Bad paths, missing tools, invalid config. Raised before any unit is touched. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** External tool exited non-zero, or exited zero without leaving its marker. */
export class StageFailure extends Error {
  readonly stage: StageName;
  readonly unitId: string;

  constructor(stage: StageName, unitId: string, reason: string) {
    super(`${stage} failed for ${unitId}: ${reason}`);
    this.name = "StageFailure";
    this.stage = stage;
    this.unitId = unitId;
  }
}

export class StageTimeout extends Error {
  readonly stage: StageName;
  readonly unitId: string;
  readonly timeoutMs: number;

  constructor(stage: StageName, unitId: string, timeoutMs: number) {
    super(`${stage} timed out for ${unitId} after ${timeoutMs}ms`);
    this.name = "StageTimeout";
    this.stage = stage;
    this.unitId = unitId;
    this.timeoutMs = timeoutMs;
  }
}

/** Raw artifact could not be removed after a verified success. */
export class DeleteFailure extends Error {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Failed to delete ${path}: ${reason}`);
    this.name = "DeleteFailure";
    this.path = path;
  }
}

export class AggregationDataAbsent extends Error {
  readonly variant: MeasurementVariant;

  constructor(variant: MeasurementVariant) {
    super(`No qualifying result rows for variant ${variant}`);
    this.name = "AggregationDataAbsent";
    this.variant = variant;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
