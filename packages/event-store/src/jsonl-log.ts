/**
 * @lanekeeper/event-store — File-based JSONL status log.
 *
 * Layout: `<rootDir>/<feature>/status.events.jsonl`, one canonical JSON
 * event per line.
 *
 * Crash safety:
 * - Appends hold the feature's lock file and fsync before returning
 * - An append after a torn last line starts on a fresh line, so only the
 *   torn line is lost
 * - Merged rewrites go to a temp file that is renamed over the log
 * - A torn last line is reported as a LineError on read, never hidden
 *
 * Properties:
 * - Durable: events survive process restart
 * - Append-only: only writeMerged replaces the file, and only with a superset
 * - Stateless: every read goes to disk, so other writers are always visible
 */

import {
  appendFileSync,
  closeSync,
  fstatSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  readSync,
  renameSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import type { StatusEvent } from "@lanekeeper/types";
import type {
  AppendResult,
  AppendWithResult,
  EventBuilder,
  ReadResult,
  StatusLog,
  WriteMergedResult,
} from "./types.js";
import { AppendError, SchemaError, StatusLogError } from "./types.js";
import { parseLog, serializeEvent, serializeLog } from "./codec.js";
import { requireStatusEvent } from "./schema.js";
import { FileLock, errnoCode } from "./file-lock.js";
import type { FileLockOptions } from "./file-lock.js";

export const EVENTS_FILENAME = "status.events.jsonl";
export const LOCK_SUFFIX = ".lock";

export interface JsonlStatusLogOptions {
  /** Directory holding one subdirectory per feature */
  readonly rootDir: string;
  readonly lock?: FileLockOptions;
}

/** True for an empty file or one whose last byte is a newline. */
function endsWithNewline(fd: number): boolean {
  const { size } = fstatSync(fd);
  if (size === 0) return true;
  const last = Buffer.alloc(1);
  readSync(fd, last, 0, 1, size - 1);
  return last[0] === 0x0a;
}

export class JsonlStatusLog implements StatusLog {
  private readonly _rootDir: string;
  private readonly _lockOptions: FileLockOptions;

  constructor(options: JsonlStatusLogOptions) {
    this._rootDir = options.rootDir;
    this._lockOptions = options.lock ?? {};
  }

  get rootDir(): string {
    return this._rootDir;
  }

  featureDir(feature: string): string {
    return join(this._rootDir, feature);
  }

  logPath(feature: string): string {
    return join(this.featureDir(feature), EVENTS_FILENAME);
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(event: unknown): AppendResult {
    const valid = requireStatusEvent(event);
    const feature = valid.aggregateId.feature;

    this._ensureFeatureDir(feature);
    this._lockFor(feature).withLock(() => this._writeLine(feature, valid));

    return { feature, eventId: valid.eventId, location: this.logPath(feature) };
  }

  appendWith(feature: string, build: EventBuilder): AppendWithResult {
    this._ensureFeatureDir(feature);
    return this._lockFor(feature).withLock(() => {
      const previous = this.readAll(feature);
      const event = requireStatusEvent(build(previous), feature);
      this._writeLine(feature, event);
      return {
        feature,
        eventId: event.eventId,
        location: this.logPath(feature),
        event,
        previous,
      };
    });
  }

  // ─── Read ───────────────────────────────────────────────────────────

  readAll(feature: string): ReadResult {
    const content = this.readRaw(feature);
    return content === undefined ? { events: [], errors: [] } : parseLog(content);
  }

  /** The log's exact bytes, or undefined when it does not exist. */
  readRaw(feature: string): string | undefined {
    const path = this.logPath(feature);
    try {
      return readFileSync(path, "utf-8");
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return undefined;
      const error = new StatusLogError("READ_FAILED", `Failed to read ${path}`, feature);
      error.cause = err;
      throw error;
    }
  }

  // ─── Merge ──────────────────────────────────────────────────────────

  writeMerged(feature: string, events: readonly StatusEvent[]): WriteMergedResult {
    const foreign = events.find((e) => e.aggregateId.feature !== feature);
    if (foreign !== undefined) {
      throw new SchemaError(
        [`event ${foreign.eventId} belongs to feature "${foreign.aggregateId.feature}"`],
        feature,
      );
    }

    const path = this.logPath(feature);
    this._ensureFeatureDir(feature);

    this._lockFor(feature).withLock(() => {
      const current = this.readAll(feature);
      if (current.errors.length > 0) {
        throw new AppendError(
          "HISTORY_LOSS",
          `${path} has ${current.errors.length} unreadable line(s); rewriting would drop them`,
          feature,
        );
      }

      const incoming = new Set(events.map((e) => e.eventId));
      const missing = current.events.filter((e) => !incoming.has(e.eventId));
      if (missing.length > 0) {
        throw new AppendError(
          "HISTORY_LOSS",
          `Merged log for ${feature} is missing ${missing.length} existing event(s): ${missing
            .map((e) => e.eventId)
            .join(", ")}`,
          feature,
        );
      }

      const tmpPath = `${path}.tmp`;
      try {
        writeFileSync(tmpPath, serializeLog(events), "utf-8");
        const fd = openSync(tmpPath, "r");
        try {
          fsyncSync(fd);
        } finally {
          closeSync(fd);
        }
        renameSync(tmpPath, path);
      } catch (err) {
        throw new AppendError("IO_ERROR", `Failed to rewrite ${path}`, feature, {
          cause: err,
        });
      }
    });

    return { feature, eventCount: events.length, location: path };
  }

  // ─── Internals ──────────────────────────────────────────────────────

  /** Caller holds the lock. */
  private _writeLine(feature: string, event: StatusEvent): void {
    const path = this.logPath(feature);
    let fd: number | undefined;
    try {
      fd = openSync(path, "a+");
      const separator = endsWithNewline(fd) ? "" : "\n";
      appendFileSync(fd, `${separator}${serializeEvent(event)}\n`, "utf-8");
      fsyncSync(fd);
    } catch (err) {
      throw new AppendError("IO_ERROR", `Failed to append to ${path}`, feature, {
        cause: err,
      });
    } finally {
      if (fd !== undefined) closeSync(fd);
    }
  }

  private _lockFor(feature: string): FileLock {
    return new FileLock(`${this.logPath(feature)}${LOCK_SUFFIX}`, this._lockOptions);
  }

  private _ensureFeatureDir(feature: string): void {
    try {
      mkdirSync(this.featureDir(feature), { recursive: true });
    } catch (err) {
      throw new AppendError("IO_ERROR", `Failed to create ${this.featureDir(feature)}`, feature, {
        cause: err,
      });
    }
  }
}
