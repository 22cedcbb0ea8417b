/**
 * @lanekeeper/event-store — Core interfaces.
 *
 * A StatusLog is the append-only, per-feature record of status events.
 * It is the only authoritative status state; snapshots are derived from it.
 *
 * Rules:
 * - Append-only: existing lines are never edited or removed
 * - Events are validated before anything is written
 * - Reads are side-effect-free and take no lock
 * - A read-then-append that must see the latest log goes through appendWith
 * - A merged rewrite must keep every event already on disk
 */

import type { StatusEvent } from "@lanekeeper/types";

// =============================================================================
// Results
// =============================================================================

/**
 * A line of the log that could not be parsed or failed validation.
 *
 * Reported, never silently dropped.
 */
export interface LineError {
  /** 1-based line number in the log file */
  readonly line: number;
  readonly message: string;
}

export interface ReadResult {
  /** Valid events, in file order */
  readonly events: readonly StatusEvent[];
  readonly errors: readonly LineError[];
}

export interface AppendResult {
  readonly feature: string;
  readonly eventId: string;
  /** Where the event was written ("memory" for in-process logs) */
  readonly location: string;
}

export interface AppendWithResult extends AppendResult {
  /** The event as validated and written */
  readonly event: StatusEvent;
  /** The log as read under the lock, before this append */
  readonly previous: ReadResult;
}

/**
 * Builds the next event from the log as it stands under the lock.
 * Throwing aborts the append.
 */
export type EventBuilder = (current: ReadResult) => unknown;

export interface WriteMergedResult {
  readonly feature: string;
  readonly eventCount: number;
  readonly location: string;
}

// =============================================================================
// StatusLog Interface
// =============================================================================

/**
 * Append-only status log, partitioned by feature.
 */
export interface StatusLog {
  /**
   * Validate and append one event to its feature's log.
   *
   * @throws SchemaError when the event is malformed (nothing is written)
   * @throws AppendError when the write or lock fails
   */
  append(event: unknown): AppendResult;

  /**
   * Read a feature's log, build the next event from it, and append that
   * event, all while holding the feature's lock. No other writer can
   * append between the read and the write.
   *
   * @throws whatever `build` throws (nothing is written)
   * @throws SchemaError when the built event is malformed or belongs to
   *   another feature
   * @throws AppendError when the write or lock fails
   */
  appendWith(feature: string, build: EventBuilder): AppendWithResult;

  /**
   * Read every line of a feature's log.
   *
   * A missing log reads as empty. Malformed lines are reported in
   * `errors` alongside the valid events.
   */
  readAll(feature: string): ReadResult;

  /**
   * Replace a feature's log with a merged, ordered event list.
   *
   * The list must contain every event currently in the log.
   *
   * @throws AppendError with code HISTORY_LOSS otherwise
   */
  writeMerged(feature: string, events: readonly StatusEvent[]): WriteMergedResult;
}

// =============================================================================
// Errors
// =============================================================================

export type StatusLogErrorCode =
  | "SCHEMA_ERROR"
  | "IO_ERROR"
  | "LOCK_TIMEOUT"
  | "HISTORY_LOSS"
  | "READ_FAILED";

/**
 * Base error for status log operations.
 */
export class StatusLogError extends Error {
  constructor(
    public readonly code: StatusLogErrorCode,
    message: string,
    public readonly feature?: string,
  ) {
    super(message);
    this.name = "StatusLogError";
  }
}

/**
 * An event failed schema validation. Raised before any write.
 */
export class SchemaError extends StatusLogError {
  constructor(
    public readonly issues: readonly string[],
    feature?: string,
  ) {
    super("SCHEMA_ERROR", `Invalid status event: ${issues.join("; ")}`, feature);
    this.name = "SchemaError";
  }
}

export type AppendErrorCode = "IO_ERROR" | "LOCK_TIMEOUT" | "HISTORY_LOSS";

/**
 * A valid event could not be persisted.
 */
export class AppendError extends StatusLogError {
  constructor(
    public override readonly code: AppendErrorCode,
    message: string,
    feature?: string,
    options?: { readonly cause?: unknown },
  ) {
    super(code, message, feature);
    this.name = "AppendError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}
