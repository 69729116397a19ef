// Arm Angle Pipeline - Shared TypeScript interfaces and types

// ─── Stages ─────────────────────────────────────────────────────────────────────

/** Per-unit stages, in the fixed order they run for every unit. */
export type UnitStageName = "extract" | "pose" | "label" | "measure";

/** Export runs once per invocation across the whole store, after the unit stages. */
export type StageName = UnitStageName | "export";

export const UNIT_STAGES: readonly UnitStageName[] = ["extract", "pose", "label", "measure"];

export const ALL_STAGES: readonly StageName[] = [...UNIT_STAGES, "export"];

export type UnitLifecycle = "raw" | "extracted" | "deleted-raw" | "labeled" | "measured";

// ─── Markers ────────────────────────────────────────────────────────────────────

/**
 * Proof that a stage completed. Evaluated against a stage output directory
 * (the published one, or the staging one right after the tool exits).
 */
export type MarkerSpec =
  | {
      /** At least one file whose name matches, and none of them empty. */
      kind: "any-file";
      pattern: RegExp;
    }
  | {
      /** Every extracted frame has a non-empty `<frame><suffix>/<fileName>`. */
      kind: "per-frame";
      suffix: string;
      fileName: string;
    };

export interface StageDefinition {
  name: UnitStageName;
  /** Published output directory, relative to the unit directory. */
  outputDir: string;
  marker: MarkerSpec;
  /** Stage that must be complete before this one can run. */
  requires: UnitStageName | null;
}

// ─── Units ──────────────────────────────────────────────────────────────────────

export interface Unit {
  id: string;
  /** Absolute path of the unit directory (may not exist yet). */
  dir: string;
  /** Absolute path of the raw video, or null when it is absent on disk. */
  rawPath: string | null;
}

export interface UnitStatus {
  unit: Unit;
  lifecycle: UnitLifecycle;
  completed: Record<UnitStageName, boolean>;
}

// ─── Stage outcomes ─────────────────────────────────────────────────────────────

export interface StageMetrics {
  durationMs: number;
  /** Files in the published output directory that satisfy the marker. */
  markerFiles: number;
}

export type StageOutcome =
  | { kind: "success"; metrics: StageMetrics }
  | { kind: "failure"; reason: string; durationMs: number }
  | { kind: "timeout"; reason: string; durationMs: number };

export type DeleteOutcome =
  | { kind: "deleted" }
  | { kind: "kept"; reason: string }
  | { kind: "delete-failed"; reason: string };

/** What happened to one unit for one stage in this invocation. */
export type UnitStepStatus = "processed" | "skipped" | "failed" | "timeout" | "blocked";

export interface UnitStepResult {
  unitId: string;
  stage: StageName;
  status: UnitStepStatus;
  reason: string | null;
  deletion: DeleteOutcome | null;
}

// ─── Run report ─────────────────────────────────────────────────────────────────

export interface StageCounts {
  processed: number;
  skipped: number;
  /** Failures including timeouts. */
  failed: number;
  timedOut: number;
  blocked: number;
  deleted: number;
  deleteFailed: number;
}

export interface UnitFailure {
  unitId: string;
  stage: StageName;
  status: "failed" | "timeout" | "blocked" | "delete-failed";
  reason: string;
}

export interface RunReport {
  runId: string;
  /** Stages that were active this run, in order. */
  stages: StageName[];
  counts: Record<StageName, StageCounts>;
  failures: UnitFailure[];
  aggregation: AggregationResult | null;
}

// ─── Observations and aggregation ───────────────────────────────────────────────

export type MeasurementVariant = "shoulder_wrist" | "elbow_wrist";

export const MEASUREMENT_VARIANTS: readonly MeasurementVariant[] = ["shoulder_wrist", "elbow_wrist"];

export interface Observation {
  unitId: string;
  /** e.g. "frame_0007" */
  frameName: string;
  frameIndex: number;
  /** null = detection failed for this frame and variant. */
  angles: Record<MeasurementVariant, number | null>;
}

export interface ResultRow {
  unitId: string;
  frameName: string;
  variant: MeasurementVariant;
  prediction: number;
  groundTruth: number;
}

export interface ThresholdConfig {
  /** Degrees. */
  tight: number;
  /** Degrees. */
  loose: number;
}

export type SummaryStatus = "ok" | "no-data";

/** Numeric fields are null when there is no data to compute them from. */
export interface SummaryMetricSet {
  variant: MeasurementVariant;
  status: SummaryStatus;
  observations: number;
  units: number;
  failedFrames: number;
  maePerObservation: number | null;
  maePerUnitAverage: number | null;
  stdGroundTruth: number | null;
  stdPredictionPerObservation: number | null;
  stdPredictionPerUnitAverage: number | null;
  stdAbsErrorPerObservation: number | null;
  pctAbove: number | null;
  pctBelow: number | null;
  pctWithinTight: number | null;
  pctWithinLoose: number | null;
}

export interface HistogramBin {
  start: number;
  end: number;
  count: number;
}

export interface ErrorHistogram {
  variant: MeasurementVariant;
  binWidth: number | null;
  bins: HistogramBin[];
}

export interface AggregationResult {
  observations: Observation[];
  rows: ResultRow[];
  summaries: SummaryMetricSet[];
  unmatchedUnits: string[];
}

// ─── Plotting ───────────────────────────────────────────────────────────────────

export type PlotFormat = "png" | "svg" | "pdf" | "jpg";

export const PLOT_FORMATS: readonly PlotFormat[] = ["png", "svg", "pdf", "jpg"];

export type BinSpec = { kind: "count"; count: number } | { kind: "width"; width: number };
