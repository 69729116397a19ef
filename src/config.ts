// Arm Angle Pipeline - Configuration
//
// Precedence: defaults < config file < environment < CLI flags.

import { constants } from "node:fs";
import { access, readFile, stat } from "node:fs/promises";
import { delimiter, isAbsolute, join, resolve } from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { BinSpec, PlotFormat, ThresholdConfig, UnitStageName } from "./types.js";

// ─── Types ──────────────────────────────────────────────────────────────────────

export interface StageCommand {
  command: string;
  /** Placeholders: {input} {output} {unit} {unitDir} {stage}. */
  args: string[];
  timeoutMs: number;
}

export interface GroundTruthConfig {
  path: string;
  keyColumn: string;
  angleColumn: string;
}

export interface PlotConfig {
  enabled: boolean;
  format: PlotFormat;
  bins: BinSpec;
  /** External renderer; {input} {output} {format} placeholders. */
  command: StageCommand | null;
}

export interface PipelineConfig {
  videosDir: string;
  /** Export destination; defaults to `<videosDir>/data_analysis`. */
  outputDir: string;
  stages: Partial<Record<UnitStageName, StageCommand>>;
  skip: Set<UnitStageName | "export">;
  force: boolean;
  keepRaw: boolean;
  concurrency: number;
  groundTruth: GroundTruthConfig;
  thresholds: ThresholdConfig;
  plot: PlotConfig;
}

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const DEFAULT_STAGE_TIMEOUT_MS = 5 * 60 * 1000;

export const DEFAULT_VIDEOS_DIR = "baseball_vids";

export const DEFAULT_OUTPUT_DIR_NAME = "data_analysis";

export const CONFIG_FILE_NAME = "pipeline.config.json";

export const DEFAULT_BIN_COUNT = 20;

/** Upper bound on histogram bins, whether counted or derived from a width. */
export const MAX_HISTOGRAM_BINS = 10_000;

export const DEFAULT_THRESHOLDS: ThresholdConfig = { tight: 3, loose: 8 };

// ─── Config file schema ─────────────────────────────────────────────────────────

const stageCommandSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  timeoutMs: z.number().int().positive().optional(),
});

const configFileSchema = z
  .object({
    videosDir: z.string().min(1).optional(),
    outputDir: z.string().min(1).optional(),
    stageTimeoutMs: z.number().int().positive().optional(),
    stages: z
      .object({
        extract: stageCommandSchema.optional(),
        pose: stageCommandSchema.optional(),
        label: stageCommandSchema.optional(),
        measure: stageCommandSchema.optional(),
      })
      .strict()
      .default({}),
    groundTruth: z
      .object({
        path: z.string().min(1).optional(),
        keyColumn: z.string().min(1).optional(),
        angleColumn: z.string().min(1).optional(),
      })
      .default({}),
    thresholds: z
      .object({
        tight: z.number().positive().optional(),
        loose: z.number().positive().optional(),
      })
      .default({}),
    plotCommand: stageCommandSchema.optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/** Settings that come from the command line. Absent fields fall through. */
export interface ConfigOverrides {
  videosDir?: string;
  configPath?: string;
  outputDir?: string;
  skip?: Array<UnitStageName | "export">;
  force?: boolean;
  keepRaw?: boolean;
  concurrency?: number;
  plot?: boolean;
  plotFormat?: PlotFormat;
  bins?: number;
  binWidth?: number;
}

// ─── Loading ────────────────────────────────────────────────────────────────────

export function parseConfigFile(raw: string, source: string): ConfigFile {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`${source} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`${source} is invalid: ${issues}`);
  }
  return parsed.data;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value === "") return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${value}"`);
  }
  return n;
}

/** Bin width takes precedence over bin count when both are given. */
export function resolveBinSpec(bins: number | undefined, binWidth: number | undefined): BinSpec {
  if (binWidth !== undefined) {
    if (!(binWidth > 0)) throw new ConfigurationError(`Bin width must be positive, got ${binWidth}`);
    return { kind: "width", width: binWidth };
  }
  if (bins !== undefined) {
    if (!Number.isInteger(bins) || bins <= 0) throw new ConfigurationError(`Bin count must be a positive integer, got ${bins}`);
    if (bins > MAX_HISTOGRAM_BINS) throw new ConfigurationError(`Bin count must be at most ${MAX_HISTOGRAM_BINS}, got ${bins}`);
    return { kind: "count", count: bins };
  }
  return { kind: "count", count: DEFAULT_BIN_COUNT };
}

/**
 * Builds the effective configuration. Reads the config file (explicit path, or
 * `pipeline.config.json` inside the videos directory when present) but does
 * not check that directories or tools exist; see `validateConfig`.
 */
export async function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Promise<PipelineConfig> {
  const envVideosDir = env.VIDEOS_DIR || undefined;
  const preliminaryVideosDir = resolve(cwd, overrides.videosDir ?? envVideosDir ?? DEFAULT_VIDEOS_DIR);

  let file: ConfigFile = parseConfigFile("{}", "defaults");
  if (overrides.configPath) {
    const configPath = resolve(cwd, overrides.configPath);
    if (!(await fileExists(configPath))) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
    file = parseConfigFile(await readFile(configPath, "utf-8"), configPath);
  } else {
    const implicitPath = join(preliminaryVideosDir, CONFIG_FILE_NAME);
    if (await fileExists(implicitPath)) {
      file = parseConfigFile(await readFile(implicitPath, "utf-8"), implicitPath);
    }
  }

  const videosDir = resolve(cwd, overrides.videosDir ?? envVideosDir ?? file.videosDir ?? DEFAULT_VIDEOS_DIR);
  const outputDir = resolve(videosDir, overrides.outputDir ?? file.outputDir ?? DEFAULT_OUTPUT_DIR_NAME);

  const defaultTimeout =
    parsePositiveInt(env.STAGE_TIMEOUT_MS, "STAGE_TIMEOUT_MS") ?? file.stageTimeoutMs ?? DEFAULT_STAGE_TIMEOUT_MS;

  const stages: Partial<Record<UnitStageName, StageCommand>> = {};
  for (const [name, cmd] of Object.entries(file.stages)) {
    if (!cmd || !isUnitStageName(name)) continue;
    stages[name] = { command: cmd.command, args: cmd.args, timeoutMs: cmd.timeoutMs ?? defaultTimeout };
  }

  const concurrency = overrides.concurrency ?? 1;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  const thresholds: ThresholdConfig = {
    tight: file.thresholds.tight ?? DEFAULT_THRESHOLDS.tight,
    loose: file.thresholds.loose ?? DEFAULT_THRESHOLDS.loose,
  };
  if (thresholds.tight > thresholds.loose) {
    throw new ConfigurationError(`Tight threshold (${thresholds.tight}) exceeds loose threshold (${thresholds.loose})`);
  }

  const plotCommand = file.plotCommand
    ? { command: file.plotCommand.command, args: file.plotCommand.args, timeoutMs: file.plotCommand.timeoutMs ?? defaultTimeout }
    : null;

  return {
    videosDir,
    outputDir,
    stages,
    skip: new Set(overrides.skip ?? []),
    force: overrides.force ?? false,
    keepRaw: overrides.keepRaw ?? false,
    concurrency,
    groundTruth: {
      path: env.GROUND_TRUTH_PATH
        ? resolve(cwd, env.GROUND_TRUTH_PATH)
        : resolve(videosDir, file.groundTruth.path ?? "ground_truth.csv"),
      keyColumn: file.groundTruth.keyColumn ?? "PitchId",
      angleColumn: file.groundTruth.angleColumn ?? "ArmAngle",
    },
    thresholds,
    plot: {
      enabled: overrides.plot ?? false,
      format: overrides.plotFormat ?? "png",
      bins: resolveBinSpec(overrides.bins, overrides.binWidth),
      command: plotCommand,
    },
  };
}

function isUnitStageName(name: string): name is UnitStageName {
  return name === "extract" || name === "pose" || name === "label" || name === "measure";
}

// ─── Validation ─────────────────────────────────────────────────────────────────

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, process.platform === "win32" ? constants.F_OK : constants.X_OK);
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolves a stage command to an executable path. Commands containing a path
 * separator are taken relative to `cwd`; bare names are searched on PATH.
 * Returns null when nothing executable is found.
 */
export async function resolveCommand(
  command: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Promise<string | null> {
  if (isAbsolute(command) || command.includes("/") || command.includes("\\")) {
    const full = resolve(cwd, command);
    return (await isExecutable(full)) ? full : null;
  }
  const extensions = process.platform === "win32" ? (env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";") : [""];
  for (const dir of (env.PATH ?? "").split(delimiter)) {
    if (!dir) continue;
    for (const ext of extensions) {
      const candidate = join(dir, command + ext);
      if (await isExecutable(candidate)) return candidate;
    }
  }
  return null;
}

/**
 * Checks everything the active stages need before any unit is touched.
 * Throws ConfigurationError on the first problem.
 */
export async function validateConfig(
  config: PipelineConfig,
  activeUnitStages: readonly UnitStageName[],
  exportActive: boolean,
  env: NodeJS.ProcessEnv = process.env,
): Promise<void> {
  const videosStat = await stat(config.videosDir).catch(() => null);
  if (!videosStat) {
    throw new ConfigurationError(`Videos directory not found: ${config.videosDir}`);
  }
  if (!videosStat.isDirectory()) {
    throw new ConfigurationError(`Videos path is not a directory: ${config.videosDir}`);
  }

  for (const stage of activeUnitStages) {
    const cmd = config.stages[stage];
    if (!cmd) {
      throw new ConfigurationError(
        `No command configured for stage "${stage}". Add it to ${CONFIG_FILE_NAME} or pass --skip-${stage}.`,
      );
    }
    if ((await resolveCommand(cmd.command, env)) === null) {
      throw new ConfigurationError(`Command for stage "${stage}" not found: ${cmd.command}`);
    }
  }

  if (exportActive) {
    if (!(await fileExists(config.groundTruth.path))) {
      throw new ConfigurationError(`Ground truth file not found: ${config.groundTruth.path}`);
    }
    if (config.plot.enabled) {
      if (!config.plot.command) {
        throw new ConfigurationError("Plotting requested but no plotCommand is configured");
      }
      if ((await resolveCommand(config.plot.command.command, env)) === null) {
        throw new ConfigurationError(`Plot command not found: ${config.plot.command.command}`);
      }
    }
  }
}
