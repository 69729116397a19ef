// Arm Angle Pipeline - Safe-Delete Policy
//
// The raw video goes only after extraction has succeeded and its frames are
// published. Ordering: write output → verify marker → delete raw. A crash
// between the last two leaves both on disk; the next run skips extraction and
// retries just the deletion.

import { rm } from "node:fs/promises";
import { DeleteFailure, errorMessage } from "./errors.js";
import { silentLogger, type PipelineLogger } from "./logger.js";
import type { DeleteOutcome, StageOutcome, Unit } from "./types.js";
import { isComplete, rawExists } from "./unit-store.js";

export type RemoveFile = (path: string) => Promise<void>;

const defaultRemove: RemoveFile = (path) => rm(path);

export interface SafeDeleteOptions {
  keepRaw: boolean;
  logger?: PipelineLogger;
  /** Injected for tests that simulate permission errors. */
  remove?: RemoveFile;
}

/**
 * Deletes the unit's raw video iff the triggering outcome is a success and
 * `keepRaw` is false. The extract marker is re-checked on disk first. A
 * failed deletion is reported, never thrown.
 */
export async function maybeDeleteRaw(
  unit: Unit,
  outcome: StageOutcome,
  options: SafeDeleteOptions,
): Promise<DeleteOutcome> {
  const logger = options.logger ?? silentLogger;
  const remove = options.remove ?? defaultRemove;

  if (outcome.kind !== "success") {
    return { kind: "kept", reason: `extraction did not succeed (${outcome.kind})` };
  }
  if (options.keepRaw) {
    return { kind: "kept", reason: "keep-raw requested" };
  }
  if (unit.rawPath === null || !(await rawExists(unit))) {
    return { kind: "kept", reason: "raw artifact already absent" };
  }
  if (!(await isComplete(unit, "extract"))) {
    return { kind: "kept", reason: "extracted frames are not published" };
  }

  try {
    await remove(unit.rawPath);
  } catch (err) {
    const failure = new DeleteFailure(unit.rawPath, errorMessage(err));
    logger.warn(failure.message);
    return { kind: "delete-failed", reason: failure.message };
  }
  logger.info(`Deleted raw video for ${unit.id}`);
  return { kind: "deleted" };
}
