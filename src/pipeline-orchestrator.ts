/**
 * PipelineOrchestrator: sequences the stages over every unit in the videos
 * directory, then runs the export once.
 *
 * For each active stage in order, for each unit: skip when the idempotency
 * gate says the stage is complete (and force is off), otherwise run the
 * stage tool. A failing unit never stops its siblings. Outcomes are folded
 * into a RunReport that belongs to this invocation only.
 *
 * Constraint: no two invocations may target the same videos directory at the
 * same time. The gate takes no locks; concurrent writers to one unit's
 * staging or output directories would race.
 */

import { mkdir } from "node:fs/promises";
import { basename, dirname, resolve } from "node:path";
import { v4 as uuidv4 } from "uuid";
import { buildErrorHistogram, aggregate } from "./aggregator.js";
import { validateConfig, type PipelineConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { silentLogger, type PipelineLogger } from "./logger.js";
import { loadGroundTruth } from "./observations.js";
import { ResultExporter } from "./result-export.js";
import { maybeDeleteRaw, type RemoveFile } from "./safe-delete.js";
import { StageRunner, type ProcessLauncher } from "./stage-runner.js";
import {
  ALL_STAGES,
  MEASUREMENT_VARIANTS,
  UNIT_STAGES,
  type AggregationResult,
  type RunReport,
  type StageCounts,
  type StageName,
  type Unit,
  type UnitStageName,
  type UnitStepResult,
} from "./types.js";
import { STAGE_DEFINITIONS, checkPublished, discoverUnits, isComplete, rawExists } from "./unit-store.js";
import { mapWithConcurrency } from "./utils/concurrency.js";

/** Unit id used for the global export step in reports. */
export const EXPORT_SCOPE = "(all units)";

// ─── Run report accumulator ─────────────────────────────────────────────────────

export function emptyCounts(): StageCounts {
  return { processed: 0, skipped: 0, failed: 0, timedOut: 0, blocked: 0, deleted: 0, deleteFailed: 0 };
}

export function createRunReport(runId: string, stages: StageName[]): RunReport {
  const counts = {
    extract: emptyCounts(),
    pose: emptyCounts(),
    label: emptyCounts(),
    measure: emptyCounts(),
    export: emptyCounts(),
  };
  return { runId, stages, counts, failures: [], aggregation: null };
}

/** Folds one unit step into the report. Each step lands in exactly one bucket. */
export function recordStep(report: RunReport, step: UnitStepResult): void {
  const counts = report.counts[step.stage];
  switch (step.status) {
    case "processed":
      counts.processed++;
      break;
    case "skipped":
      counts.skipped++;
      break;
    case "failed":
      counts.failed++;
      report.failures.push({ unitId: step.unitId, stage: step.stage, status: "failed", reason: step.reason ?? "unknown" });
      break;
    case "timeout":
      counts.failed++;
      counts.timedOut++;
      report.failures.push({ unitId: step.unitId, stage: step.stage, status: "timeout", reason: step.reason ?? "timed out" });
      break;
    case "blocked":
      counts.blocked++;
      report.failures.push({ unitId: step.unitId, stage: step.stage, status: "blocked", reason: step.reason ?? "blocked" });
      break;
  }

  if (step.deletion?.kind === "deleted") {
    counts.deleted++;
  } else if (step.deletion?.kind === "delete-failed") {
    counts.deleteFailed++;
    report.failures.push({ unitId: step.unitId, stage: step.stage, status: "delete-failed", reason: step.deletion.reason });
  }
}

/**
 * Stages where every unit that reached the gate failed or timed out. Blocked
 * units are not counted either way.
 */
export function totalStageFailures(report: RunReport): StageName[] {
  return report.stages.filter((stage) => {
    const c = report.counts[stage];
    return c.failed > 0 && c.processed === 0 && c.skipped === 0;
  });
}

export function exitCodeFor(report: RunReport): number {
  return totalStageFailures(report).length > 0 ? 1 : 0;
}

export function activeStages(skip: ReadonlySet<StageName>): StageName[] {
  return ALL_STAGES.filter((stage) => !skip.has(stage));
}

// ─── Orchestrator ───────────────────────────────────────────────────────────────

export interface PipelineOrchestratorDeps {
  runId?: string;
  launcher?: ProcessLauncher;
  logger?: PipelineLogger;
  /** Raw-artifact removal, injected by tests. */
  removeFile?: RemoveFile;
  env?: NodeJS.ProcessEnv;
}

export class PipelineOrchestrator {
  private config: PipelineConfig;
  private runId: string;
  private runner: StageRunner;
  private logger: PipelineLogger;
  private removeFile: RemoveFile | undefined;
  private env: NodeJS.ProcessEnv;

  constructor(config: PipelineConfig, deps: PipelineOrchestratorDeps = {}) {
    this.config = config;
    this.runId = deps.runId ?? uuidv4();
    this.logger = deps.logger ?? silentLogger;
    this.runner = new StageRunner({ runId: this.runId, launcher: deps.launcher, logger: this.logger });
    this.removeFile = deps.removeFile;
    this.env = deps.env ?? process.env;
  }

  /**
   * Runs every active stage. Throws ConfigurationError before touching any
   * unit; everything after that is recorded in the returned report.
   */
  async run(): Promise<RunReport> {
    const stages = activeStages(this.config.skip);
    const unitStages = UNIT_STAGES.filter((s) => stages.includes(s));
    const exportActive = stages.includes("export");

    await validateConfig(this.config, unitStages, exportActive, this.env);
    const groundTruth = exportActive ? await loadGroundTruth(this.config.groundTruth, this.logger) : null;
    const units = await discoverUnits(this.config.videosDir, { reserved: this.reservedDirNames() });

    this.logger.info(
      `Run ${this.runId}: ${units.length} unit(s), stages [${stages.join(", ")}]` +
        `${this.config.force ? ", force" : ""}${this.config.keepRaw ? ", keep raw" : ""}`,
    );

    const report = createRunReport(this.runId, stages);

    for (const stage of unitStages) {
      const steps = await mapWithConcurrency(units, this.config.concurrency, (unit) => this.processUnit(unit, stage));
      for (const step of steps) {
        recordStep(report, step);
      }
      const c = report.counts[stage];
      this.logger.info(
        `${stage}: ${c.processed} processed, ${c.skipped} skipped, ${c.failed} failed (${c.timedOut} timed out), ` +
          `${c.blocked} blocked${stage === "extract" ? `, ${c.deleted} raw deleted` : ""}`,
      );
    }

    if (groundTruth !== null) {
      const { step, aggregation } = await this.runExport(units, groundTruth, report);
      recordStep(report, step);
      report.aggregation = aggregation;
    }

    return report;
  }

  /** One unit, one stage. Never throws: unexpected errors become a failed step. */
  async processUnit(unit: Unit, stage: UnitStageName): Promise<UnitStepResult> {
    const step = (status: UnitStepResult["status"], reason: string | null = null): UnitStepResult => ({
      unitId: unit.id,
      stage,
      status,
      reason,
      deletion: null,
    });

    try {
      if (await isComplete(unit, stage, { force: this.config.force })) {
        if (stage === "extract") {
          return { ...step("skipped"), deletion: await this.retryDeletion(unit) };
        }
        return step("skipped");
      }

      const required = STAGE_DEFINITIONS[stage].requires;
      if (required !== null && !(await isComplete(unit, required))) {
        return step("blocked", `requires ${required}, which is incomplete`);
      }

      if (stage === "extract" && !(await rawExists(unit))) {
        // Forced re-extraction after the raw was deleted: the published frames stay.
        if (this.config.force && (await isComplete(unit, "extract"))) {
          return step("skipped", "raw artifact already deleted; kept published frames");
        }
        return step("failed", "raw artifact missing and no extracted frames");
      }

      const command = this.config.stages[stage];
      if (!command) {
        return step("failed", `no command configured for ${stage}`);
      }

      const outcome = await this.runner.run(unit, stage, command);
      const deletion =
        stage === "extract"
          ? await maybeDeleteRaw(unit, outcome, { keepRaw: this.config.keepRaw, logger: this.logger, remove: this.removeFile })
          : null;

      switch (outcome.kind) {
        case "success":
          this.logger.info(`${stage} ${unit.id}: ok (${outcome.metrics.markerFiles} file(s), ${outcome.metrics.durationMs}ms)`);
          return { ...step("processed"), deletion };
        case "timeout":
          this.logger.warn(outcome.reason);
          return { ...step("timeout", outcome.reason), deletion };
        case "failure":
          this.logger.warn(outcome.reason);
          return { ...step("failed", outcome.reason), deletion };
      }
    } catch (err) {
      const reason = `unexpected error: ${errorMessage(err)}`;
      this.logger.error(`${stage} ${unit.id}: ${reason}`);
      return step("failed", reason);
    }
  }

  /**
   * Extraction already verified in an earlier run but the raw is still
   * present: the earlier run stopped between success and deletion.
   */
  private async retryDeletion(unit: Unit) {
    if (this.config.keepRaw || !(await rawExists(unit))) return null;
    const check = await checkPublished(unit, "extract");
    return maybeDeleteRaw(
      unit,
      { kind: "success", metrics: { durationMs: 0, markerFiles: check.markerFiles } },
      { keepRaw: false, logger: this.logger, remove: this.removeFile },
    );
  }

  private async runExport(
    units: Unit[],
    groundTruth: ReadonlyMap<string, number>,
    report: RunReport,
  ): Promise<{ step: UnitStepResult; aggregation: AggregationResult | null }> {
    const step = (status: UnitStepResult["status"], reason: string | null = null): UnitStepResult => ({
      unitId: EXPORT_SCOPE,
      stage: "export",
      status,
      reason,
      deletion: null,
    });

    try {
      const aggregation = await aggregate(units, groundTruth, this.config.thresholds, this.logger);
      const exporter = new ResultExporter(this.config.outputDir);
      const written = await exporter.save({
        observations: aggregation.observations,
        groundTruth,
        summaries: aggregation.summaries,
        thresholds: this.config.thresholds,
      });
      this.logger.info(`Export wrote ${written.join(", ")}`);

      // Histogram and plot problems are reported without discarding the tables.
      let histogramWritten = false;
      try {
        const histograms = MEASUREMENT_VARIANTS.map((variant) =>
          buildErrorHistogram(aggregation.rows, variant, this.config.plot.bins),
        );
        this.logger.info(`Export wrote ${await exporter.saveHistograms(histograms)}`);
        histogramWritten = true;
      } catch (err) {
        const reason = `histogram: ${errorMessage(err)}`;
        this.logger.warn(`Histogram export failed: ${errorMessage(err)}`);
        report.failures.push({ unitId: EXPORT_SCOPE, stage: "export", status: "failed", reason });
      }

      const plot = this.config.plot;
      if (histogramWritten && plot.enabled && plot.command) {
        await mkdir(exporter.plotsDir, { recursive: true });
        const outcome = await this.runner.invoke("plot", plot.command, {
          input: exporter.histogramPath,
          output: exporter.plotsDir,
          format: plot.format,
        });
        if (outcome.kind !== "success") {
          this.logger.warn(`Plot rendering failed: ${outcome.reason}`);
          report.failures.push({ unitId: EXPORT_SCOPE, stage: "export", status: "failed", reason: `plot: ${outcome.reason}` });
        }
      }

      return { step: step("processed"), aggregation };
    } catch (err) {
      const reason = `export failed: ${errorMessage(err)}`;
      this.logger.error(reason);
      return { step: step("failed", reason), aggregation: null };
    }
  }

  /** The export directory, when it sits directly inside the videos directory, is not a unit. */
  private reservedDirNames(): string[] {
    const names = ["data_analysis"];
    if (resolve(dirname(this.config.outputDir)) === resolve(this.config.videosDir)) {
      names.push(basename(this.config.outputDir));
    }
    return names;
  }
}
