#!/usr/bin/env node
// Arm Angle Pipeline - Entry point
// Parses flags, loads configuration, runs the pipeline and sets the exit code.

import "dotenv/config";
import { parseArgs, confirmRawDeletion, USAGE } from "./cli.js";
import { loadConfig } from "./config.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { createConsoleLogger } from "./logger.js";
import { PipelineOrchestrator, exitCodeFor, totalStageFailures } from "./pipeline-orchestrator.js";
import { formatRunSummary } from "./run-summary.js";

export const APP_NAME = "Arm Angle Pipeline";
export const APP_VERSION = "0.1.0";

/** Exit code for bad flags or configuration. */
export const EXIT_CONFIGURATION = 2;

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

export async function main(argv: string[]): Promise<number> {
  const cli = parseArgs(argv);
  if (cli.help) {
    console.log(USAGE);
    return 0;
  }

  logInit(`${APP_NAME} v${APP_VERSION}`);
  const config = await loadConfig(cli.overrides);
  logInit(`Videos directory: ${config.videosDir}`);
  logInit(`Export directory: ${config.outputDir}`);

  const extractActive = !config.skip.has("extract");
  if (extractActive && !config.keepRaw && !cli.yes) {
    const confirmed = await confirmRawDeletion();
    if (!confirmed) {
      logInit("Raw videos will be kept (pass --yes to delete after verified extraction)");
      config.keepRaw = true;
    }
  }

  const orchestrator = new PipelineOrchestrator(config, { logger: createConsoleLogger("Pipeline") });
  const report = await orchestrator.run();

  console.log(formatRunSummary(report));

  const failedStages = totalStageFailures(report);
  if (failedStages.length > 0) {
    logFatal(`Every attempted unit failed in stage(s): ${failedStages.join(", ")}`);
  }
  return exitCodeFor(report);
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof ConfigurationError) {
      logFatal(err.message);
      console.error(USAGE);
      process.exitCode = EXIT_CONFIGURATION;
      return;
    }
    logFatal(`Unexpected error: ${errorMessage(err)}`);
    process.exitCode = 1;
  },
);
