/**
 * StageRunner: runs one external stage tool against one unit under a
 * wall-clock limit and classifies what happened.
 *
 * The tool writes into the unit's staging directory. Exit status zero is not
 * enough: the stage marker must hold in staging before the output is
 * published. Failed or timed-out output stays in staging for inspection and
 * is cleared on the next attempt.
 */

import { spawn } from "node:child_process";
import { join } from "node:path";
import type { StageCommand } from "./config.js";
import { StageFailure, StageTimeout, errorMessage } from "./errors.js";
import { silentLogger, type PipelineLogger } from "./logger.js";
import type { StageOutcome, Unit, UnitStageName } from "./types.js";
import {
  FRAMES_DIR,
  STAGE_DEFINITIONS,
  checkMarker,
  listFrames,
  prepareStaging,
  publishStageOutput,
  stageOutputDir,
} from "./unit-store.js";

// ─── Process launching ──────────────────────────────────────────────────────────

export interface LaunchRequest {
  command: string;
  args: string[];
  env: Record<string, string>;
  timeoutMs: number;
}

export interface LaunchResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  /** Set when the process could not be started at all. */
  spawnError: string | null;
  /** Last lines the tool wrote to stderr. */
  stderrTail: string[];
}

export interface ProcessLauncher {
  launch(request: LaunchRequest): Promise<LaunchResult>;
}

/** Lines of stderr kept for failure reasons. */
export const STDERR_TAIL_LINES = 20;

const MAX_STDERR_BUFFER = 64 * 1024;

/** Delay between SIGTERM and SIGKILL for a timed-out tool. */
export const DEFAULT_KILL_GRACE_MS = 2000;

function isNoSuchProcess(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ESRCH";
}

/**
 * Launches tools with child_process.spawn, each in its own process group. On
 * timeout the whole group gets SIGTERM, then SIGKILL once the grace period
 * ends. The result is settled by then at the latest, even when a helper the
 * tool forked still holds its stderr open.
 */
export function createSpawnLauncher(killGraceMs: number = DEFAULT_KILL_GRACE_MS): ProcessLauncher {
  return {
    launch(request: LaunchRequest): Promise<LaunchResult> {
      return new Promise<LaunchResult>((resolve) => {
        let stderr = "";
        let timedOut = false;
        let settled = false;
        let killTimer: ReturnType<typeof setTimeout> | null = null;

        const child = spawn(request.command, request.args, {
          env: { ...process.env, ...request.env },
          stdio: ["ignore", "inherit", "pipe"],
          detached: true,
        });

        child.stderr?.on("data", (chunk: Buffer) => {
          stderr += chunk.toString("utf-8");
          if (stderr.length > MAX_STDERR_BUFFER) {
            stderr = stderr.slice(-MAX_STDERR_BUFFER);
          }
        });

        const signalGroup = (signal: NodeJS.Signals) => {
          if (child.pid === undefined) return;
          try {
            process.kill(-child.pid, signal);
          } catch (err) {
            if (!isNoSuchProcess(err)) child.kill(signal);
          }
        };

        const settle = (result: Omit<LaunchResult, "timedOut" | "stderrTail">) => {
          if (settled) return;
          settled = true;
          clearTimeout(timeoutTimer);
          if (killTimer) clearTimeout(killTimer);
          resolve({ ...result, timedOut, stderrTail: tailLines(stderr) });
        };

        const timeoutTimer = setTimeout(() => {
          timedOut = true;
          signalGroup("SIGTERM");
          killTimer = setTimeout(() => {
            signalGroup("SIGKILL");
            child.stderr?.destroy();
            settle({ exitCode: child.exitCode, signal: child.signalCode, spawnError: null });
          }, killGraceMs);
        }, request.timeoutMs);

        child.on("error", (err) => {
          settle({ exitCode: null, signal: null, spawnError: err.message });
        });

        child.on("close", (code, signal) => {
          settle({ exitCode: code, signal, spawnError: null });
        });
      });
    },
  };
}

export function tailLines(text: string, count: number = STDERR_TAIL_LINES): string[] {
  const lines = text.split(/\r?\n/).filter((line) => line.trim() !== "");
  return lines.slice(-count);
}

/**
 * Substitutes `{name}` placeholders. Unknown placeholders are left as-is.
 * With `appendIO`, the input and output paths are appended when the template
 * mentions neither.
 */
export function expandArgs(template: string[], vars: Record<string, string>, appendIO: boolean = false): string[] {
  const expanded = template.map((arg) =>
    arg.replace(/\{(\w+)\}/g, (whole, name: string) => (name in vars ? vars[name] : whole)),
  );
  const mentionsIO = template.some((arg) => arg.includes("{input}") || arg.includes("{output}"));
  if (appendIO && !mentionsIO && vars.input !== undefined && vars.output !== undefined) {
    expanded.push(vars.input, vars.output);
  }
  return expanded;
}

function describeExit(result: LaunchResult): string {
  const base = result.spawnError
    ? `could not start: ${result.spawnError}`
    : result.signal
      ? `killed by ${result.signal}`
      : `exited with code ${result.exitCode}`;
  return result.stderrTail.length > 0 ? `${base}\n${result.stderrTail.join("\n")}` : base;
}

// ─── Stage runner ───────────────────────────────────────────────────────────────

export interface StageRunnerDeps {
  runId: string;
  launcher?: ProcessLauncher;
  logger?: PipelineLogger;
}

export class StageRunner {
  private runId: string;
  private launcher: ProcessLauncher;
  private logger: PipelineLogger;

  constructor(deps: StageRunnerDeps) {
    this.runId = deps.runId;
    this.launcher = deps.launcher ?? createSpawnLauncher();
    this.logger = deps.logger ?? silentLogger;
  }

  /** Path handed to the tool as `{input}`, or null when it does not exist. */
  inputPath(unit: Unit, stage: UnitStageName): string | null {
    switch (stage) {
      case "extract":
        return unit.rawPath;
      case "pose":
      case "label":
        return join(unit.dir, FRAMES_DIR);
      case "measure":
        return stageOutputDir(unit, "label");
    }
  }

  async run(unit: Unit, stage: UnitStageName, command: StageCommand): Promise<StageOutcome> {
    const started = Date.now();
    const elapsed = () => Date.now() - started;

    const input = this.inputPath(unit, stage);
    if (input === null) {
      return { kind: "failure", reason: new StageFailure(stage, unit.id, "raw artifact missing").message, durationMs: 0 };
    }

    const staging = await prepareStaging(unit, stage);
    const vars = {
      input,
      output: staging,
      unit: unit.id,
      unitDir: unit.dir,
      stage,
    };
    const args = expandArgs(command.args, vars, true);

    this.logger.info(`${stage} ${unit.id}: ${command.command} ${args.join(" ")}`);

    const result = await this.launcher.launch({
      command: command.command,
      args,
      env: {
        PIPELINE_STAGE: stage,
        PIPELINE_UNIT_ID: unit.id,
        PIPELINE_UNIT_DIR: unit.dir,
        PIPELINE_INPUT: input,
        PIPELINE_OUTPUT: staging,
      },
      timeoutMs: command.timeoutMs,
    });

    if (result.timedOut) {
      return { kind: "timeout", reason: new StageTimeout(stage, unit.id, command.timeoutMs).message, durationMs: elapsed() };
    }
    if (result.spawnError !== null || result.exitCode !== 0) {
      return { kind: "failure", reason: new StageFailure(stage, unit.id, describeExit(result)).message, durationMs: elapsed() };
    }

    const frames = stage === "extract" ? [] : await listFrames(unit.dir);
    const check = await checkMarker(STAGE_DEFINITIONS[stage].marker, staging, frames);
    if (!check.complete) {
      return {
        kind: "failure",
        reason: new StageFailure(stage, unit.id, `exited 0 but marker is missing or empty (${check.missing})`).message,
        durationMs: elapsed(),
      };
    }

    try {
      await publishStageOutput(unit, stage, this.runId);
    } catch (err) {
      return {
        kind: "failure",
        reason: new StageFailure(stage, unit.id, `could not publish output: ${errorMessage(err)}`).message,
        durationMs: elapsed(),
      };
    }

    return { kind: "success", metrics: { durationMs: elapsed(), markerFiles: check.markerFiles } };
  }

  /**
   * Runs a tool that has no marker of its own (the plot renderer). Same timeout
   * and classification; success means exit status zero.
   */
  async invoke(label: string, command: StageCommand, vars: Record<string, string>): Promise<StageOutcome> {
    const started = Date.now();
    const args = expandArgs(command.args, vars, true);
    this.logger.info(`${label}: ${command.command} ${args.join(" ")}`);
    const result = await this.launcher.launch({ command: command.command, args, env: {}, timeoutMs: command.timeoutMs });
    const durationMs = Date.now() - started;
    if (result.timedOut) {
      return { kind: "timeout", reason: `${label} timed out after ${command.timeoutMs}ms`, durationMs };
    }
    if (result.spawnError !== null || result.exitCode !== 0) {
      return { kind: "failure", reason: `${label} ${describeExit(result)}`, durationMs };
    }
    return { kind: "success", metrics: { durationMs, markerFiles: 0 } };
  }
}
