/**
 * @lanekeeper/event-store — Snapshot file (status.json).
 *
 * The snapshot is a derived, disposable view of the log. It is written as
 * sorted-key JSON with two-space indentation so diffs stay readable, and
 * replaced atomically (temp file + rename) so readers never see half of it.
 *
 * A missing or unreadable snapshot is not an error: callers rebuild it
 * from the log.
 */

import { readFileSync, renameSync, writeFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import type { StatusSnapshot } from "@lanekeeper/types";
import { isStatusSnapshot } from "@lanekeeper/types";
import { canonicalHash, toCanonicalJson } from "./canonical.js";
import { errnoCode } from "./file-lock.js";
import { AppendError } from "./types.js";

export const SNAPSHOT_FILENAME = "status.json";

/**
 * SHA-256 of the snapshot's canonical JSON. Equal snapshots hash equal
 * regardless of key order.
 */
export function computeSnapshotHash(snapshot: StatusSnapshot): string {
  return canonicalHash(snapshot);
}

/** The exact text written to status.json. */
export function renderSnapshot(snapshot: StatusSnapshot): string {
  const sorted: unknown = JSON.parse(toCanonicalJson(snapshot));
  return `${JSON.stringify(sorted, null, 2)}\n`;
}

/**
 * Atomically write `<featureDir>/status.json`.
 *
 * @returns The snapshot path
 */
export function writeSnapshotFile(featureDir: string, snapshot: StatusSnapshot): string {
  const path = join(featureDir, SNAPSHOT_FILENAME);
  const tmpPath = `${path}.tmp`;
  try {
    mkdirSync(featureDir, { recursive: true });
    writeFileSync(tmpPath, renderSnapshot(snapshot), "utf-8");
    renameSync(tmpPath, path);
  } catch (err) {
    throw new AppendError("IO_ERROR", `Failed to write ${path}`, snapshot.feature, {
      cause: err,
    });
  }
  return path;
}

/**
 * Read `<featureDir>/status.json`.
 *
 * @returns The snapshot, or undefined if missing or malformed
 */
export function readSnapshotFile(featureDir: string): StatusSnapshot | undefined {
  const path = join(featureDir, SNAPSHOT_FILENAME);
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return undefined;
    throw new AppendError("IO_ERROR", `Failed to read ${path}`, undefined, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return undefined;
  }
  return isStatusSnapshot(parsed) ? parsed : undefined;
}
