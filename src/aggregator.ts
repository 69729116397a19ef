// Arm Angle Pipeline - Aggregator
//
// Folds per-frame observations into accuracy metrics against ground truth.
// Two aggregation policies are kept as separate functions over the same
// Result Row set:
//   per-observation   every (unit, frame) row is one sample
//   per-unit-average  each unit's predictions are averaged first; one sample per unit
//
// Standard deviations use the population formula (divide by N). Fewer than two
// samples yields null, as does any metric over zero samples.

import { MAX_HISTOGRAM_BINS } from "./config.js";
import { AggregationDataAbsent, ConfigurationError } from "./errors.js";
import { silentLogger, type PipelineLogger } from "./logger.js";
import { readUnitObservations } from "./observations.js";
import {
  MEASUREMENT_VARIANTS,
  type AggregationResult,
  type BinSpec,
  type ErrorHistogram,
  type HistogramBin,
  type MeasurementVariant,
  type Observation,
  type ResultRow,
  type SummaryMetricSet,
  type ThresholdConfig,
  type Unit,
} from "./types.js";

// ─── Result rows ────────────────────────────────────────────────────────────────

export interface ResultRowSet {
  rows: ResultRow[];
  /** Frames of ground-truth units with no value for the variant. */
  failedFrames: Record<MeasurementVariant, number>;
  /** Units that have observations but no ground truth. */
  unmatchedUnits: string[];
}

/**
 * Joins observations to ground truth: one row per (unit, frame, variant) with
 * a value. Units without ground truth are left out; absent values are
 * tallied, not turned into rows.
 */
export function buildResultRows(observations: Observation[], groundTruth: ReadonlyMap<string, number>): ResultRowSet {
  const rows: ResultRow[] = [];
  const failedFrames: Record<MeasurementVariant, number> = { shoulder_wrist: 0, elbow_wrist: 0 };
  const unmatched = new Set<string>();

  for (const obs of observations) {
    const truth = groundTruth.get(obs.unitId);
    if (truth === undefined) {
      unmatched.add(obs.unitId);
      continue;
    }
    for (const variant of MEASUREMENT_VARIANTS) {
      const prediction = obs.angles[variant];
      if (prediction === null) {
        failedFrames[variant]++;
        continue;
      }
      rows.push({ unitId: obs.unitId, frameName: obs.frameName, variant, prediction, groundTruth: truth });
    }
  }

  return { rows, failedFrames, unmatchedUnits: [...unmatched].sort() };
}

export function rowsForVariant(rows: ResultRow[], variant: MeasurementVariant): ResultRow[] {
  return rows.filter((row) => row.variant === variant);
}

// ─── Basic statistics ───────────────────────────────────────────────────────────

export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Population standard deviation; null for fewer than two values. */
export function standardDeviation(values: number[]): number | null {
  if (values.length < 2) return null;
  const m = mean(values);
  if (m === null) return null;
  let squares = 0;
  for (const v of values) squares += (v - m) ** 2;
  return Math.sqrt(squares / values.length);
}

// ─── Per-observation policy ─────────────────────────────────────────────────────

export function absoluteErrors(rows: ResultRow[]): number[] {
  return rows.map((row) => Math.abs(row.prediction - row.groundTruth));
}

/** Mean of |prediction - ground truth| over every row. */
export function perObservationMae(rows: ResultRow[]): number | null {
  return mean(absoluteErrors(rows));
}

export interface PercentageMetrics {
  pctAbove: number;
  pctBelow: number;
  pctWithinTight: number;
  pctWithinLoose: number;
}

/**
 * Shares (0–100) over per-observation rows. A prediction equal to ground
 * truth is neither above nor below.
 */
export function percentageMetrics(rows: ResultRow[], thresholds: ThresholdConfig): PercentageMetrics | null {
  if (rows.length === 0) return null;
  let above = 0;
  let below = 0;
  let tight = 0;
  let loose = 0;
  for (const row of rows) {
    const error = row.prediction - row.groundTruth;
    if (error > 0) above++;
    else if (error < 0) below++;
    const abs = Math.abs(error);
    if (abs <= thresholds.tight) tight++;
    if (abs <= thresholds.loose) loose++;
  }
  const pct = (n: number) => (n / rows.length) * 100;
  return { pctAbove: pct(above), pctBelow: pct(below), pctWithinTight: pct(tight), pctWithinLoose: pct(loose) };
}

// ─── Per-unit-average policy ────────────────────────────────────────────────────

export interface UnitAverage {
  unitId: string;
  meanPrediction: number;
  groundTruth: number;
  absError: number;
  frames: number;
}

/** Collapses rows to one averaged prediction per unit, in unit id order. */
export function perUnitAverages(rows: ResultRow[]): UnitAverage[] {
  const byUnit = new Map<string, { sum: number; count: number; groundTruth: number }>();
  for (const row of rows) {
    const acc = byUnit.get(row.unitId);
    if (acc) {
      acc.sum += row.prediction;
      acc.count++;
    } else {
      byUnit.set(row.unitId, { sum: row.prediction, count: 1, groundTruth: row.groundTruth });
    }
  }
  return [...byUnit.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([unitId, acc]) => {
      const meanPrediction = acc.sum / acc.count;
      return {
        unitId,
        meanPrediction,
        groundTruth: acc.groundTruth,
        absError: Math.abs(meanPrediction - acc.groundTruth),
        frames: acc.count,
      };
    });
}

/** Mean over units of |unit mean prediction - ground truth|. */
export function perUnitAverageMae(rows: ResultRow[]): number | null {
  return mean(perUnitAverages(rows).map((u) => u.absError));
}

// ─── Summary ────────────────────────────────────────────────────────────────────

export function noDataSummary(variant: MeasurementVariant, failedFrames: number): SummaryMetricSet {
  return {
    variant,
    status: "no-data",
    observations: 0,
    units: 0,
    failedFrames,
    maePerObservation: null,
    maePerUnitAverage: null,
    stdGroundTruth: null,
    stdPredictionPerObservation: null,
    stdPredictionPerUnitAverage: null,
    stdAbsErrorPerObservation: null,
    pctAbove: null,
    pctBelow: null,
    pctWithinTight: null,
    pctWithinLoose: null,
  };
}

/** Summary for one variant. `rows` must already be limited to that variant. */
export function summarizeVariant(
  variant: MeasurementVariant,
  rows: ResultRow[],
  failedFrames: number,
  thresholds: ThresholdConfig,
): SummaryMetricSet {
  if (rows.length === 0) {
    return noDataSummary(variant, failedFrames);
  }
  const units = perUnitAverages(rows);
  const pct = percentageMetrics(rows, thresholds);
  return {
    variant,
    status: "ok",
    observations: rows.length,
    units: units.length,
    failedFrames,
    maePerObservation: perObservationMae(rows),
    maePerUnitAverage: perUnitAverageMae(rows),
    stdGroundTruth: standardDeviation(units.map((u) => u.groundTruth)),
    stdPredictionPerObservation: standardDeviation(rows.map((r) => r.prediction)),
    stdPredictionPerUnitAverage: standardDeviation(units.map((u) => u.meanPrediction)),
    stdAbsErrorPerObservation: standardDeviation(absoluteErrors(rows)),
    pctAbove: pct?.pctAbove ?? null,
    pctBelow: pct?.pctBelow ?? null,
    pctWithinTight: pct?.pctWithinTight ?? null,
    pctWithinLoose: pct?.pctWithinLoose ?? null,
  };
}

export function summarize(
  rowSet: Pick<ResultRowSet, "rows" | "failedFrames">,
  thresholds: ThresholdConfig,
  logger: PipelineLogger = silentLogger,
): SummaryMetricSet[] {
  return MEASUREMENT_VARIANTS.map((variant) => {
    const rows = rowsForVariant(rowSet.rows, variant);
    if (rows.length === 0) {
      logger.warn(new AggregationDataAbsent(variant).message);
    }
    return summarizeVariant(variant, rows, rowSet.failedFrames[variant], thresholds);
  });
}

// ─── Histogram ──────────────────────────────────────────────────────────────────

/** Histogram of signed errors (prediction - ground truth) for one variant. */
export function buildErrorHistogram(rows: ResultRow[], variant: MeasurementVariant, spec: BinSpec): ErrorHistogram {
  const errors = rowsForVariant(rows, variant).map((r) => r.prediction - r.groundTruth);
  if (errors.length === 0) {
    return { variant, binWidth: spec.kind === "width" ? spec.width : null, bins: [] };
  }
  let min = errors[0];
  let max = errors[0];
  for (const e of errors) {
    if (e < min) min = e;
    if (e > max) max = e;
  }

  let start: number;
  let width: number;
  let count: number;
  if (spec.kind === "width") {
    width = spec.width;
    start = Math.floor(min / width) * width;
    count = Math.floor((max - start) / width) + 1;
    if (count > MAX_HISTOGRAM_BINS) {
      throw new ConfigurationError(
        `Bin width ${width} yields ${count} bins for ${variant} (at most ${MAX_HISTOGRAM_BINS}); use a larger --bin-width`,
      );
    }
  } else {
    start = min;
    count = spec.count;
    width = (max - min) / count;
    if (width === 0) {
      return { variant, binWidth: 0, bins: [{ start: min, end: max, count: errors.length }] };
    }
  }

  const bins: HistogramBin[] = Array.from({ length: count }, (_, i) => ({
    start: start + i * width,
    end: start + (i + 1) * width,
    count: 0,
  }));
  for (const e of errors) {
    const idx = Math.min(count - 1, Math.max(0, Math.floor((e - start) / width)));
    bins[idx].count++;
  }
  return { variant, binWidth: width, bins };
}

// ─── Entry point ────────────────────────────────────────────────────────────────

/**
 * Reads every unit's terminal output and rebuilds the Result Row set and the
 * summaries from scratch. Units without ground truth are not read.
 */
export async function aggregate(
  units: Unit[],
  groundTruth: ReadonlyMap<string, number>,
  thresholds: ThresholdConfig,
  logger: PipelineLogger = silentLogger,
): Promise<AggregationResult> {
  const observations: Observation[] = [];
  const withoutTruth: string[] = [];
  for (const unit of units) {
    if (!groundTruth.has(unit.id)) {
      withoutTruth.push(unit.id);
      continue;
    }
    observations.push(...(await readUnitObservations(unit, logger)));
  }

  const rowSet = buildResultRows(observations, groundTruth);
  const unmatchedUnits = [...new Set([...withoutTruth, ...rowSet.unmatchedUnits])].sort();
  if (unmatchedUnits.length > 0) {
    logger.warn(`${unmatchedUnits.length} unit(s) without ground truth excluded: ${unmatchedUnits.join(", ")}`);
  }

  return {
    observations,
    rows: rowSet.rows,
    summaries: summarize(rowSet, thresholds, logger),
    unmatchedUnits,
  };
}
