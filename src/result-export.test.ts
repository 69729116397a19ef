import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { noDataSummary } from "./aggregator.js";
import {
  ResultExporter,
  formatAngle,
  formatMetric,
  formatResultsCsv,
  formatSummaryCsv,
  roundTo,
  summaryColumns,
} from "./result-export.js";
import type { Observation, SummaryMetricSet } from "./types.js";

const THRESHOLDS = { tight: 3, loose: 8 };

const OBSERVATIONS: Observation[] = [
  { unitId: "p2", frameName: "frame_0001", frameIndex: 1, angles: { shoulder_wrist: 50.12345, elbow_wrist: null } },
  { unitId: "p1", frameName: "frame_0010", frameIndex: 10, angles: { shoulder_wrist: 41, elbow_wrist: 39.5 } },
  { unitId: "p1", frameName: "frame_0002", frameIndex: 2, angles: { shoulder_wrist: null, elbow_wrist: null } },
  { unitId: "p3", frameName: "frame_0001", frameIndex: 1, angles: { shoulder_wrist: 12, elbow_wrist: 12 } },
];

const GROUND_TRUTH = new Map([
  ["p1", 40],
  ["p2", 48.25],
]);

const OK_SUMMARY: SummaryMetricSet = {
  variant: "shoulder_wrist",
  status: "ok",
  observations: 2,
  units: 2,
  failedFrames: 1,
  maePerObservation: 1.4375,
  maePerUnitAverage: 1.4375,
  stdGroundTruth: 4.125,
  stdPredictionPerObservation: 4.56172,
  stdPredictionPerUnitAverage: 4.56172,
  stdAbsErrorPerObservation: 0.4375,
  pctAbove: 100,
  pctBelow: 0,
  pctWithinTight: 100,
  pctWithinLoose: 100,
};

describe("number formatting", () => {
  it("rounds to the requested precision", () => {
    expect(roundTo(1.23456, 2)).toBe(1.23);
    expect(formatAngle(50.12345)).toBe("50.123");
    expect(formatMetric(2 / 3)).toBe("0.6667");
  });

  it("writes N/A for absent values, never zero", () => {
    expect(formatAngle(null)).toBe("N/A");
    expect(formatMetric(null)).toBe("N/A");
    expect(formatMetric(0)).toBe("0");
  });
});

describe("formatResultsCsv", () => {
  it("lists ground-truth units sorted by unit then frame index", () => {
    expect(formatResultsCsv(OBSERVATIONS, GROUND_TRUTH)).toBe(
      [
        "unit_id,frame_name,pitcher_angle_shoulder_wrist,pitcher_angle_elbow_wrist,ground_truth_angle",
        "p1,frame_0002,N/A,N/A,40",
        "p1,frame_0010,41,39.5,40",
        "p2,frame_0001,50.123,N/A,48.25",
        "",
      ].join("\n"),
    );
  });
});

describe("formatSummaryCsv", () => {
  it("names threshold columns after their thresholds", () => {
    expect(summaryColumns({ tight: 2.5, loose: 10 }).slice(-2)).toEqual(["pct_within_2.5", "pct_within_10"]);
  });

  it("writes one row per variant with N/A for the no-data sentinel", () => {
    const csv = formatSummaryCsv([OK_SUMMARY, noDataSummary("elbow_wrist", 3)], THRESHOLDS);

    expect(csv.split("\n")).toEqual([
      summaryColumns(THRESHOLDS).join(","),
      "shoulder_wrist,ok,2,2,1,1.4375,1.4375,4.125,4.5617,4.5617,0.4375,100,0,100,100",
      "elbow_wrist,no-data,0,0,3,N/A,N/A,N/A,N/A,N/A,N/A,N/A,N/A,N/A,N/A",
      "",
    ]);
  });
});

describe("ResultExporter", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "result-export-test-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("writes the three export files and nothing else", async () => {
    const outputDir = join(root, "data_analysis");
    const exporter = new ResultExporter(outputDir);

    const written = await exporter.save({
      observations: OBSERVATIONS,
      groundTruth: GROUND_TRUTH,
      summaries: [OK_SUMMARY],
      thresholds: THRESHOLDS,
    });
    const histogramPath = await exporter.saveHistograms([
      { variant: "shoulder_wrist", binWidth: 1, bins: [{ start: 1, end: 2, count: 2 }] },
    ]);

    expect(written).toEqual([join(outputDir, "results.csv"), join(outputDir, "summary.csv")]);
    expect(histogramPath).toBe(join(outputDir, "histogram.json"));
    expect((await readdir(outputDir)).sort()).toEqual(["histogram.json", "results.csv", "summary.csv"]);
    expect(JSON.parse(await readFile(exporter.histogramPath, "utf-8"))).toEqual({
      histograms: [{ variant: "shoulder_wrist", binWidth: 1, bins: [{ start: 1, end: 2, count: 2 }] }],
    });
    expect(exporter.plotsDir).toBe(join(outputDir, "plots"));
  });

  it("produces identical files when saved twice from the same input", async () => {
    const exporter = new ResultExporter(root);
    const input = {
      observations: OBSERVATIONS,
      groundTruth: GROUND_TRUTH,
      summaries: [OK_SUMMARY],
      thresholds: THRESHOLDS,
    };

    await exporter.save(input);
    const first = await readFile(join(root, "results.csv"), "utf-8");
    await exporter.save(input);

    expect(await readFile(join(root, "results.csv"), "utf-8")).toBe(first);
  });
});
