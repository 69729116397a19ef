// Arm Angle Pipeline - Unit Store and Idempotency Gate
//
// The videos directory is the only record of what has been done. Nothing is
// cached between invocations; every question is answered by looking at disk.
//
// Layout:
//   {videosDir}/{unitId}.mp4          raw artifact
//   {videosDir}/{unitId}/
//     release_frames/frame_0001.jpg
//     poses/frame_0001_poses/data.json
//     pitcher_labels/frame_0001_pitcher/data.json
//     pitcher_calculations/frame_0001_angle/data.json
//     .staging/{stage}/               in-flight output, never trusted

import { mkdir, readdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import { ConfigurationError } from "./errors.js";
import type {
  MarkerSpec,
  StageDefinition,
  Unit,
  UnitLifecycle,
  UnitStageName,
  UnitStatus,
} from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

export const RAW_EXTENSIONS = new Set([".mp4", ".mov", ".avi", ".mkv", ".m4v"]);

export const FRAME_PATTERN = /^frame_(\d+)\.(jpg|jpeg|png)$/i;

export const FRAMES_DIR = "release_frames";

export const STAGING_DIR = ".staging";

/** Width of the zero-padded frame index in frame file names. */
export const FRAME_INDEX_WIDTH = 4;

export const STAGE_DEFINITIONS: Record<UnitStageName, StageDefinition> = {
  extract: {
    name: "extract",
    outputDir: FRAMES_DIR,
    marker: { kind: "any-file", pattern: FRAME_PATTERN },
    requires: null,
  },
  pose: {
    name: "pose",
    outputDir: "poses",
    marker: { kind: "per-frame", suffix: "_poses", fileName: "data.json" },
    requires: "extract",
  },
  label: {
    name: "label",
    outputDir: "pitcher_labels",
    marker: { kind: "per-frame", suffix: "_pitcher", fileName: "data.json" },
    requires: "pose",
  },
  measure: {
    name: "measure",
    outputDir: "pitcher_calculations",
    marker: { kind: "per-frame", suffix: "_angle", fileName: "data.json" },
    requires: "label",
  },
};

// ─── Frame names ────────────────────────────────────────────────────────────────

/** `7` → `frame_0007` */
export function formatFrameName(index: number): string {
  return `frame_${String(index).padStart(FRAME_INDEX_WIDTH, "0")}`;
}

/** `frame_0007.jpg` → `frame_0007` */
export function frameStem(fileName: string): string {
  return basename(fileName, extname(fileName));
}

/** Frame index from a frame stem or file name, or null when it is not a frame. */
export function parseFrameIndex(name: string): number | null {
  const match = /^frame_(\d+)/.exec(name);
  return match ? parseInt(match[1], 10) : null;
}

// ─── Filesystem helpers ─────────────────────────────────────────────────────────

async function statOrNull(path: string) {
  try {
    return await stat(path);
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }
}

function isMissing(err: unknown): boolean {
  if (typeof err !== "object" || err === null || !("code" in err)) return false;
  return err.code === "ENOENT" || err.code === "ENOTDIR";
}

export async function isNonEmptyFile(path: string): Promise<boolean> {
  const s = await statOrNull(path);
  return s !== null && s.isFile() && s.size > 0;
}

async function readdirOrEmpty(dir: string): Promise<string[]> {
  try {
    return await readdir(dir);
  } catch (err) {
    if (isMissing(err)) return [];
    throw err;
  }
}

/**
 * Writes a file so readers see either the old content or the new content,
 * never a truncated one: write to a sibling temp file, then rename over.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmpPath = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);
  await writeFile(tmpPath, content, "utf-8");
  await rename(tmpPath, path);
}

// ─── Discovery ──────────────────────────────────────────────────────────────────

export interface DiscoverOptions {
  /** Directory names that are never units (e.g. the export directory). */
  reserved?: Iterable<string>;
}

/**
 * Lists every unit under the videos directory: one per raw video, plus unit
 * directories whose raw video is already gone. Two raw files that map to the
 * same unit id are a configuration error.
 */
export async function discoverUnits(videosDir: string, options: DiscoverOptions = {}): Promise<Unit[]> {
  const reserved = new Set(options.reserved ?? []);
  const entries = await readdir(videosDir, { withFileTypes: true });

  const raws = new Map<string, string>();
  const dirs = new Set<string>();

  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    if (entry.isFile() && RAW_EXTENSIONS.has(extname(entry.name).toLowerCase())) {
      const id = basename(entry.name, extname(entry.name));
      const existing = raws.get(id);
      if (existing !== undefined) {
        throw new ConfigurationError(
          `Unit id collision: "${existing}" and "${entry.name}" both map to "${id}"`,
        );
      }
      raws.set(id, entry.name);
    } else if (entry.isDirectory() && !reserved.has(entry.name)) {
      dirs.add(entry.name);
    }
  }

  const units: Unit[] = [];
  for (const [id, rawName] of raws) {
    units.push({ id, dir: join(videosDir, id), rawPath: join(videosDir, rawName) });
  }
  for (const id of dirs) {
    if (raws.has(id)) continue;
    const framesDir = await statOrNull(join(videosDir, id, FRAMES_DIR));
    if (framesDir?.isDirectory()) {
      units.push({ id, dir: join(videosDir, id), rawPath: null });
    }
  }

  return units.sort((a, b) => a.id.localeCompare(b.id));
}

/** Sorted frame file names under the unit's published frames directory. */
export async function listFrames(unitDir: string): Promise<string[]> {
  const names = await readdirOrEmpty(join(unitDir, FRAMES_DIR));
  return names
    .filter((name) => FRAME_PATTERN.test(name))
    .sort((a, b) => (parseFrameIndex(a) ?? 0) - (parseFrameIndex(b) ?? 0) || a.localeCompare(b));
}

// ─── Markers ────────────────────────────────────────────────────────────────────

export interface MarkerCheck {
  complete: boolean;
  markerFiles: number;
  /** First thing found missing or empty, for failure reasons. */
  missing: string | null;
}

/**
 * Evaluates a marker against a stage output directory. Directory existence
 * alone never counts: an empty directory left by a crashed run is incomplete,
 * and so is a zero-byte marker file.
 */
export async function checkMarker(marker: MarkerSpec, outputDir: string, frames: string[]): Promise<MarkerCheck> {
  if (marker.kind === "any-file") {
    let count = 0;
    for (const name of (await readdirOrEmpty(outputDir)).sort()) {
      if (!marker.pattern.test(name)) continue;
      // One truncated file means the writer died part way through.
      if (!(await isNonEmptyFile(join(outputDir, name)))) {
        return { complete: false, markerFiles: count, missing: name };
      }
      count++;
    }
    return { complete: count > 0, markerFiles: count, missing: count > 0 ? null : `no file matching ${marker.pattern}` };
  }

  if (frames.length === 0) {
    return { complete: false, markerFiles: 0, missing: "no extracted frames" };
  }
  let count = 0;
  for (const frame of frames) {
    const relative = join(`${frameStem(frame)}${marker.suffix}`, marker.fileName);
    if (!(await isNonEmptyFile(join(outputDir, relative)))) {
      return { complete: false, markerFiles: count, missing: relative };
    }
    count++;
  }
  return { complete: true, markerFiles: count, missing: null };
}

export function stageOutputDir(unit: Unit, stage: UnitStageName): string {
  return join(unit.dir, STAGE_DEFINITIONS[stage].outputDir);
}

export function stagingDir(unit: Unit, stage: UnitStageName): string {
  return join(unit.dir, STAGING_DIR, stage);
}

export interface GateOptions {
  force?: boolean;
}

/**
 * Idempotency gate. True only when the stage's published output satisfies its
 * marker. With `force`, always false. Never consults the raw video.
 */
export async function isComplete(unit: Unit, stage: UnitStageName, options: GateOptions = {}): Promise<boolean> {
  if (options.force) return false;
  return (await checkPublished(unit, stage)).complete;
}

export async function checkPublished(unit: Unit, stage: UnitStageName): Promise<MarkerCheck> {
  const frames = stage === "extract" ? [] : await listFrames(unit.dir);
  return checkMarker(STAGE_DEFINITIONS[stage].marker, stageOutputDir(unit, stage), frames);
}

export async function rawExists(unit: Unit): Promise<boolean> {
  if (unit.rawPath === null) return false;
  const s = await statOrNull(unit.rawPath);
  return s !== null && s.isFile();
}

/** Derives the lifecycle position of a unit purely from disk. */
export async function readUnitStatus(unit: Unit): Promise<UnitStatus> {
  const completed: Record<UnitStageName, boolean> = {
    extract: await isComplete(unit, "extract"),
    pose: await isComplete(unit, "pose"),
    label: await isComplete(unit, "label"),
    measure: await isComplete(unit, "measure"),
  };
  return { unit, lifecycle: deriveLifecycle(completed, await rawExists(unit)), completed };
}

export function deriveLifecycle(completed: Record<UnitStageName, boolean>, rawPresent: boolean): UnitLifecycle {
  if (completed.measure) return "measured";
  if (completed.label) return "labeled";
  if (completed.extract) return rawPresent ? "extracted" : "deleted-raw";
  return "raw";
}

// ─── Publication ────────────────────────────────────────────────────────────────

const REPLACED_INFIX = ".replaced-";

/**
 * Clears any leftover staging output, including output set aside by a publish
 * that did not finish, and returns a fresh staging directory.
 */
export async function prepareStaging(unit: Unit, stage: UnitStageName): Promise<string> {
  const dir = stagingDir(unit, stage);
  await rm(dir, { recursive: true, force: true });
  const staleAside = (await readdirOrEmpty(join(unit.dir, STAGING_DIR))).filter((name) =>
    name.startsWith(`${stage}${REPLACED_INFIX}`),
  );
  for (const name of staleAside) {
    await rm(join(unit.dir, STAGING_DIR, name), { recursive: true, force: true });
  }
  await mkdir(dir, { recursive: true });
  return dir;
}

/**
 * Moves verified staging output into place. The previous output is renamed
 * aside first, so at every instant the published path holds either the old
 * complete output, nothing, or the new complete output.
 */
export async function publishStageOutput(unit: Unit, stage: UnitStageName, runId: string): Promise<void> {
  const target = stageOutputDir(unit, stage);
  const source = stagingDir(unit, stage);
  const aside = join(unit.dir, STAGING_DIR, `${stage}${REPLACED_INFIX}${runId}`);

  const hadPrevious = (await statOrNull(target)) !== null;
  if (hadPrevious) {
    await rename(target, aside);
  }
  await rename(source, target);
  if (hadPrevious) {
    await rm(aside, { recursive: true, force: true });
  }
  await removeIfEmpty(join(unit.dir, STAGING_DIR));
}

async function removeIfEmpty(dir: string): Promise<void> {
  const remaining = await readdirOrEmpty(dir);
  if (remaining.length === 0) {
    await rm(dir, { recursive: true, force: true });
  }
}
