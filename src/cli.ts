// Arm Angle Pipeline - Command-line parsing and the deletion prompt

import { createInterface } from "node:readline/promises";
import type { ConfigOverrides } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { ALL_STAGES, PLOT_FORMATS, type PlotFormat, type StageName } from "./types.js";

export interface CliOptions {
  overrides: ConfigOverrides;
  /** Answer yes to the raw-deletion prompt. */
  yes: boolean;
  help: boolean;
}

export const USAGE = `Usage: arm-angle-pipeline [options]

Runs extract → pose → label → measure over every video, then exports results.

Options:
  --videos-dir DIR        Directory holding raw videos and unit directories
  --config FILE           Pipeline config (default: <videos-dir>/pipeline.config.json)
  --output DIR            Export directory (default: <videos-dir>/data_analysis)
  --skip-<stage>          Skip a stage this run: extract, pose, label, measure, export
  --force                 Reprocess units even when their stage output is complete
  --keep-raw              Never delete raw videos
  --yes, -y               Do not ask before deleting raw videos
  --concurrency N         Units processed in parallel per stage (default: 1)
  --plot                  Render error histograms with the configured plot command
  --plot-format FORMAT    png, svg, pdf or jpg (default: png)
  --bins N                Histogram bin count (default: 20)
  --bin-width W           Histogram bin width in degrees (overrides --bins)
  --help, -h              Show this help
`;

function requireValue(argv: string[], i: number, flag: string): string {
  const value = argv[i + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new ConfigurationError(`Missing value for ${flag}`);
  }
  return value;
}

function parseNumberFlag(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) {
    throw new ConfigurationError(`Invalid ${flag} value: ${value}`);
  }
  return n;
}

function isStageName(name: string): name is StageName {
  return ALL_STAGES.some((stage) => stage === name);
}

function isPlotFormat(value: string): value is PlotFormat {
  return PLOT_FORMATS.some((format) => format === value);
}

export function parseArgs(argv: string[]): CliOptions {
  const overrides: ConfigOverrides = {};
  const skip: StageName[] = [];
  let yes = false;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--videos-dir":
        overrides.videosDir = requireValue(argv, i++, arg);
        break;
      case "--config":
        overrides.configPath = requireValue(argv, i++, arg);
        break;
      case "--output":
      case "-o":
        overrides.outputDir = requireValue(argv, i++, arg);
        break;
      case "--force":
        overrides.force = true;
        break;
      case "--keep-raw":
        overrides.keepRaw = true;
        break;
      case "--yes":
      case "-y":
        yes = true;
        break;
      case "--concurrency":
        overrides.concurrency = parseNumberFlag(requireValue(argv, i++, arg), arg);
        break;
      case "--plot":
        overrides.plot = true;
        break;
      case "--plot-format": {
        const format = requireValue(argv, i++, arg);
        if (!isPlotFormat(format)) {
          throw new ConfigurationError(`Invalid --plot-format: ${format} (expected ${PLOT_FORMATS.join(", ")})`);
        }
        overrides.plotFormat = format;
        break;
      }
      case "--bins":
        overrides.bins = parseNumberFlag(requireValue(argv, i++, arg), arg);
        break;
      case "--bin-width":
        overrides.binWidth = parseNumberFlag(requireValue(argv, i++, arg), arg);
        break;
      case "--help":
      case "-h":
        help = true;
        break;
      default: {
        if (arg.startsWith("--skip-")) {
          const stage = arg.slice("--skip-".length);
          if (!isStageName(stage)) {
            throw new ConfigurationError(`Unknown stage in ${arg} (expected one of ${ALL_STAGES.join(", ")})`);
          }
          if (!skip.includes(stage)) skip.push(stage);
          break;
        }
        throw new ConfigurationError(`Unknown option: ${arg}`);
      }
    }
  }

  if (skip.length > 0) overrides.skip = skip;
  return { overrides, yes, help };
}

export interface PromptStreams {
  input: NodeJS.ReadableStream & { isTTY?: boolean };
  output: NodeJS.WritableStream;
}

/**
 * Asks before raw videos are deleted. Without a terminal there is nobody to
 * ask, and the answer is no.
 */
export async function confirmRawDeletion(
  streams: PromptStreams = { input: process.stdin, output: process.stdout },
): Promise<boolean> {
  if (!streams.input.isTTY) return false;
  const rl = createInterface({ input: streams.input, output: streams.output });
  try {
    const answer = await rl.question("Delete raw videos after verified frame extraction? [y/N] ");
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}
