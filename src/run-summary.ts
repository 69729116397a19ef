// Arm Angle Pipeline - Run summary rendering

import { formatMetric } from "./result-export.js";
import type { RunReport, SummaryMetricSet } from "./types.js";

const RULE = "=".repeat(60);

function pad(value: string, width: number): string {
  return value.padEnd(width);
}

/**
 * Renders the end-of-run report: counts per stage, every failure reason, and
 * the summary metrics when an export ran.
 */
export function formatRunSummary(report: RunReport): string {
  const lines: string[] = [];

  lines.push(RULE);
  lines.push(`RUN SUMMARY (${report.runId})`);
  lines.push(RULE);
  lines.push(
    `${pad("stage", 9)}${pad("processed", 11)}${pad("skipped", 9)}${pad("failed", 8)}${pad("timeout", 9)}${pad("blocked", 9)}deleted`,
  );
  for (const stage of report.stages) {
    const c = report.counts[stage];
    lines.push(
      `${pad(stage, 9)}${pad(String(c.processed), 11)}${pad(String(c.skipped), 9)}${pad(String(c.failed), 8)}` +
        `${pad(String(c.timedOut), 9)}${pad(String(c.blocked), 9)}${c.deleted}${c.deleteFailed > 0 ? ` (+${c.deleteFailed} failed)` : ""}`,
    );
  }

  if (report.failures.length > 0) {
    lines.push("");
    lines.push("Failures:");
    for (const f of report.failures) {
      const [first, ...rest] = f.reason.split("\n");
      lines.push(`  [${f.stage}] ${f.unitId} (${f.status}): ${first}`);
      for (const line of rest) lines.push(`      ${line}`);
    }
  }

  if (report.aggregation) {
    lines.push("");
    lines.push(`Result rows: ${report.aggregation.rows.length} across ${report.aggregation.observations.length} frame(s)`);
    if (report.aggregation.unmatchedUnits.length > 0) {
      lines.push(`Units without ground truth: ${report.aggregation.unmatchedUnits.length}`);
    }
    for (const summary of report.aggregation.summaries) {
      lines.push(formatVariantLine(summary));
    }
  }

  lines.push(RULE);
  return lines.join("\n");
}

export function formatVariantLine(s: SummaryMetricSet): string {
  if (s.status === "no-data") {
    return `  ${s.variant}: no data (${s.failedFrames} failed frame(s))`;
  }
  return (
    `  ${s.variant}: MAE ${formatMetric(s.maePerObservation)} per frame, ` +
    `${formatMetric(s.maePerUnitAverage)} per video average ` +
    `(${s.observations} frames, ${s.units} videos); ` +
    `within tight ${formatMetric(s.pctWithinTight)}%, within loose ${formatMetric(s.pctWithinLoose)}%`
  );
}
