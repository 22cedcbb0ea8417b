/**
 * @lanekeeper/event-store
 *
 * Append-only status event log.
 *
 * Provides:
 * - StatusLog interface with JSONL-file and in-memory implementations
 * - zod event schema shared by construction and parsing
 * - ULID event IDs and Lamport clocks
 * - Canonical JSONL codec
 * - Advisory per-feature file lock
 * - Atomic status.json snapshot files
 */

// Interfaces & errors
export type {
  LineError,
  ReadResult,
  AppendResult,
  AppendWithResult,
  EventBuilder,
  WriteMergedResult,
  StatusLog,
  StatusLogErrorCode,
  AppendErrorCode,
} from "./types.js";
export { StatusLogError, SchemaError, AppendError } from "./types.js";

// Schema
export type { EventValidation } from "./schema.js";
export {
  StatusEventSchema,
  EvidenceSchema,
  ULID_PATTERN,
  validateStatusEvent,
  requireStatusEvent,
} from "./schema.js";

// Identity & ordering
export { createEventId, isEventId, eventIdTime } from "./event-id.js";
export { LamportClock, maxLamportClock } from "./lamport-clock.js";

// Construction
export type {
  PayloadInput,
  StatusEventInput,
  StatusEventDraft,
  CreateEventOptions,
} from "./event-factory.js";
export { createStatusEvent } from "./event-factory.js";

// Serialization
export { toCanonicalJson, canonicalHash } from "./canonical.js";
export { serializeEvent, serializeLog, parseLog } from "./codec.js";

// Storage
export type { FileLockOptions, LockInfo } from "./file-lock.js";
export { FileLock, DEFAULT_LOCK_OPTIONS, errnoCode } from "./file-lock.js";
export type { JsonlStatusLogOptions } from "./jsonl-log.js";
export { JsonlStatusLog, EVENTS_FILENAME, LOCK_SUFFIX } from "./jsonl-log.js";
export { InMemoryStatusLog } from "./in-memory-log.js";

// Snapshots
export {
  SNAPSHOT_FILENAME,
  computeSnapshotHash,
  renderSnapshot,
  writeSnapshotFile,
  readSnapshotFile,
} from "./snapshot-file.js";
