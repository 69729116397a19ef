// Arm Angle Pipeline - Observation and ground-truth readers
//
// Reads the measure stage's per-frame output and the external ground-truth
// table. Both are inputs from outside this process, so both are validated.

import { readFile, readdir } from "node:fs/promises";
import { extname, join } from "node:path";
import { z } from "zod";
import type { GroundTruthConfig } from "./config.js";
import { parseCsv } from "./csv.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { silentLogger, type PipelineLogger } from "./logger.js";
import type { MeasurementVariant, Observation, Unit } from "./types.js";
import { STAGE_DEFINITIONS, parseFrameIndex } from "./unit-store.js";

// ─── Observation files ──────────────────────────────────────────────────────────

const angleValue = z.number().finite().nullable().optional();

/**
 * `pitcher_calculations/frame_NNNN_angle/data.json`. Either shape may be
 * present; `pitcher_data` is the single-variant form keyed by start joint.
 */
export const observationFileSchema = z
  .object({
    angles: z
      .object({
        shoulder_wrist: angleValue,
        elbow_wrist: angleValue,
      })
      .optional(),
    pitcher_data: z
      .object({
        start_joint: z.enum(["shoulder", "elbow"]).default("shoulder"),
        arm_angle_degrees: angleValue,
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type ObservationFile = z.infer<typeof observationFileSchema>;

const JOINT_TO_VARIANT: Record<"shoulder" | "elbow", MeasurementVariant> = {
  shoulder: "shoulder_wrist",
  elbow: "elbow_wrist",
};

const OBSERVATION_DIR_PATTERN = /^(frame_\d+)_angle$/;

function emptyAngles(): Record<MeasurementVariant, number | null> {
  return { shoulder_wrist: null, elbow_wrist: null };
}

/** Merges both file shapes into one value per variant; a number beats null. */
export function anglesFromFile(file: ObservationFile): Record<MeasurementVariant, number | null> {
  const angles = emptyAngles();
  if (file.angles) {
    angles.shoulder_wrist = file.angles.shoulder_wrist ?? null;
    angles.elbow_wrist = file.angles.elbow_wrist ?? null;
  }
  const legacy = file.pitcher_data;
  if (legacy && legacy.arm_angle_degrees !== undefined && legacy.arm_angle_degrees !== null) {
    angles[JOINT_TO_VARIANT[legacy.start_joint]] = legacy.arm_angle_degrees;
  }
  return angles;
}

/**
 * Reads every per-frame observation of a unit, ordered by frame index. An
 * unreadable or invalid file yields an observation with every variant absent.
 */
export async function readUnitObservations(unit: Unit, logger: PipelineLogger = silentLogger): Promise<Observation[]> {
  const calcDir = join(unit.dir, STAGE_DEFINITIONS.measure.outputDir);
  let entries: string[];
  try {
    entries = await readdir(calcDir);
  } catch (err) {
    logger.warn(`No measurements for ${unit.id}: ${errorMessage(err)}`);
    return [];
  }

  const observations: Observation[] = [];
  for (const entry of entries) {
    const match = OBSERVATION_DIR_PATTERN.exec(entry);
    if (!match) continue;
    const frameName = match[1];
    const frameIndex = parseFrameIndex(frameName) ?? 0;
    const path = join(calcDir, entry, "data.json");

    let angles = emptyAngles();
    try {
      const parsed = observationFileSchema.safeParse(JSON.parse(await readFile(path, "utf-8")));
      if (parsed.success) {
        angles = anglesFromFile(parsed.data);
      } else {
        logger.warn(`Invalid observation ${path}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
      }
    } catch (err) {
      logger.warn(`Failed to read observation ${path}: ${errorMessage(err)}`);
    }
    observations.push({ unitId: unit.id, frameName, frameIndex, angles });
  }

  return observations.sort((a, b) => a.frameIndex - b.frameIndex || a.frameName.localeCompare(b.frameName));
}

// ─── Ground truth ───────────────────────────────────────────────────────────────

/**
 * Parses the ground-truth table into unit id → reference angle. Keys that
 * look like file names lose their extension. Extra columns are ignored.
 */
export function parseGroundTruth(
  text: string,
  config: Pick<GroundTruthConfig, "keyColumn" | "angleColumn">,
  logger: PipelineLogger = silentLogger,
): Map<string, number> {
  const rows = parseCsv(text);
  const truth = new Map<string, number>();
  if (rows.length === 0) return truth;

  const header = rows[0].map((h) => h.trim());
  const keyIdx = header.indexOf(config.keyColumn);
  const angleIdx = header.indexOf(config.angleColumn);
  if (keyIdx === -1 || angleIdx === -1) {
    const missing = [keyIdx === -1 ? config.keyColumn : null, angleIdx === -1 ? config.angleColumn : null]
      .filter((c): c is string => c !== null)
      .join(", ");
    throw new ConfigurationError(`Ground truth is missing column(s): ${missing}`);
  }

  for (let i = 1; i < rows.length; i++) {
    const row = rows[i];
    const rawKey = (row[keyIdx] ?? "").trim();
    const rawAngle = (row[angleIdx] ?? "").trim();
    if (rawKey === "") continue;

    const unitId = stripVideoExtension(rawKey);
    const angle = Number(rawAngle);
    if (rawAngle === "" || !Number.isFinite(angle)) {
      logger.warn(`Ground truth row ${i + 1}: angle "${rawAngle}" for ${unitId} is not a number, skipping`);
      continue;
    }
    if (truth.has(unitId)) {
      logger.warn(`Ground truth row ${i + 1}: duplicate key ${unitId}, keeping the first value`);
      continue;
    }
    truth.set(unitId, angle);
  }
  return truth;
}

function stripVideoExtension(key: string): string {
  const ext = extname(key);
  return /^\.(mp4|mov|avi|mkv|m4v)$/i.test(ext) ? key.slice(0, -ext.length) : key;
}

export async function loadGroundTruth(config: GroundTruthConfig, logger: PipelineLogger = silentLogger): Promise<Map<string, number>> {
  let text: string;
  try {
    text = await readFile(config.path, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read ground truth ${config.path}: ${errorMessage(err)}`);
  }
  return parseGroundTruth(text, config, logger);
}
