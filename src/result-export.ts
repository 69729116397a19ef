// Arm Angle Pipeline - Result Export
// Writes the per-frame results table, the per-variant summary table and the
// error histograms. Every file is regenerated wholesale and published with
// write-then-rename, so a reader never sees a half-written table.
//
// Output directory structure:
//   {outputDir}/
//     results.csv
//     summary.csv
//     histogram.json
//     plots/            (external renderer, when plotting is enabled)

import { join } from "node:path";
import { formatCsv } from "./csv.js";
import type { ErrorHistogram, Observation, SummaryMetricSet, ThresholdConfig } from "./types.js";
import { writeFileAtomic } from "./unit-store.js";

/** Written wherever a value is absent. Never a numeric zero. */
export const NOT_AVAILABLE = "N/A";

export const RESULTS_FILE = "results.csv";
export const SUMMARY_FILE = "summary.csv";
export const HISTOGRAM_FILE = "histogram.json";
export const PLOTS_DIR = "plots";

export const RESULTS_COLUMNS = [
  "unit_id",
  "frame_name",
  "pitcher_angle_shoulder_wrist",
  "pitcher_angle_elbow_wrist",
  "ground_truth_angle",
];

/** Summary header; the two threshold columns carry their threshold in the name. */
export function summaryColumns(thresholds: ThresholdConfig): string[] {
  return [
    "variant",
    "status",
    "observations",
    "units",
    "failed_frames",
    "mae_per_observation",
    "mae_per_unit_average",
    "std_ground_truth",
    "std_prediction_per_observation",
    "std_prediction_per_unit_average",
    "std_abs_error_per_observation",
    "pct_above",
    "pct_below",
    `pct_within_${thresholds.tight}`,
    `pct_within_${thresholds.loose}`,
  ];
}

/** Round a value to the given number of decimal places. */
export function roundTo(value: number, precision: number): number {
  const factor = Math.pow(10, precision);
  return Math.round(value * factor) / factor;
}

function formatNumber(value: number | null, precision: number): string {
  return value === null ? NOT_AVAILABLE : String(roundTo(value, precision));
}

/** Angles keep three decimals. */
export function formatAngle(value: number | null): string {
  return formatNumber(value, 3);
}

export function formatMetric(value: number | null): string {
  return formatNumber(value, 4);
}

/**
 * One row per (unit, frame) for every unit with ground truth, sorted by unit
 * then frame. Frames where every variant failed are still listed.
 */
export function formatResultsCsv(observations: Observation[], groundTruth: ReadonlyMap<string, number>): string {
  const rows = observations
    .filter((obs) => groundTruth.has(obs.unitId))
    .sort((a, b) => a.unitId.localeCompare(b.unitId) || a.frameIndex - b.frameIndex)
    .map((obs) => [
      obs.unitId,
      obs.frameName,
      formatAngle(obs.angles.shoulder_wrist),
      formatAngle(obs.angles.elbow_wrist),
      formatAngle(groundTruth.get(obs.unitId) ?? null),
    ]);
  return formatCsv(RESULTS_COLUMNS, rows);
}

export function formatSummaryCsv(summaries: SummaryMetricSet[], thresholds: ThresholdConfig): string {
  const rows = summaries.map((s) => [
    s.variant,
    s.status,
    String(s.observations),
    String(s.units),
    String(s.failedFrames),
    formatMetric(s.maePerObservation),
    formatMetric(s.maePerUnitAverage),
    formatMetric(s.stdGroundTruth),
    formatMetric(s.stdPredictionPerObservation),
    formatMetric(s.stdPredictionPerUnitAverage),
    formatMetric(s.stdAbsErrorPerObservation),
    formatMetric(s.pctAbove),
    formatMetric(s.pctBelow),
    formatMetric(s.pctWithinTight),
    formatMetric(s.pctWithinLoose),
  ]);
  return formatCsv(summaryColumns(thresholds), rows);
}

export function formatHistograms(histograms: ErrorHistogram[]): string {
  return JSON.stringify({ histograms }, null, 2);
}

export interface ExportInput {
  observations: Observation[];
  groundTruth: ReadonlyMap<string, number>;
  summaries: SummaryMetricSet[];
  thresholds: ThresholdConfig;
}

/**
 * ResultExporter writes the export files into one output directory.
 */
export class ResultExporter {
  private outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = outputDir;
  }

  get histogramPath(): string {
    return join(this.outputDir, HISTOGRAM_FILE);
  }

  get plotsDir(): string {
    return join(this.outputDir, PLOTS_DIR);
  }

  /**
   * Writes the results and summary tables.
   * @returns Paths that were written.
   */
  async save(input: ExportInput): Promise<string[]> {
    const resultsPath = join(this.outputDir, RESULTS_FILE);
    await writeFileAtomic(resultsPath, formatResultsCsv(input.observations, input.groundTruth));

    const summaryPath = join(this.outputDir, SUMMARY_FILE);
    await writeFileAtomic(summaryPath, formatSummaryCsv(input.summaries, input.thresholds));

    return [resultsPath, summaryPath];
  }

  async saveHistograms(histograms: ErrorHistogram[]): Promise<string> {
    await writeFileAtomic(this.histogramPath, formatHistograms(histograms));
    return this.histogramPath;
  }
}
