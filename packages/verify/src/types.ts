/**
 * @lanekeeper/verify — Types for validation and health checks.
 *
 * - ValidationReport: pass/fail verdict over one feature's log, for CI
 * - DoctorFinding: one operational-hygiene problem and what to do about it
 * - DoctorResult: every finding for a feature
 */

import type { GuardViolation, MergeAmbiguity, StatusSnapshot, Supersession } from "@lanekeeper/types";
import type { LineError, ReadResult } from "@lanekeeper/event-store";
import type { MergeResult } from "@lanekeeper/merge";

// =============================================================================
// Validation
// =============================================================================

export interface ValidationInput {
  readonly feature: string;
  /** Raw read of the log, including line-level errors */
  readonly read: ReadResult;
  /** The log materialized through the merge pipeline */
  readonly merged: MergeResult;
}

/**
 * Result of validating one feature's log.
 *
 * `passed` is false when any guard violation, merge ambiguity or schema
 * error exists. Superseded events are informational.
 */
export interface ValidationReport {
  readonly feature: string;
  readonly passed: boolean;
  readonly schemaErrors: readonly LineError[];
  readonly violations: readonly GuardViolation[];
  readonly ambiguities: readonly MergeAmbiguity[];
  readonly superseded: readonly Supersession[];
  readonly eventCount: number;
}

// =============================================================================
// Doctor
// =============================================================================

export type Severity = "warning" | "error";

export type FindingCategory = "stale_claim" | "materialization_drift" | "schema_error";

export interface DoctorFinding {
  readonly severity: Severity;
  readonly category: FindingCategory;
  readonly wp?: string;
  readonly message: string;
  readonly recommendedAction: string;
}

export interface StaleClaimOptions {
  readonly now: Date;
  /** Days a WP may sit in `claimed` before it is flagged */
  readonly claimedDays: number;
  /** Days a WP may sit in `in_progress` before it is flagged */
  readonly inProgressDays: number;
}

export interface DoctorInput {
  readonly feature: string;
  /** Snapshot file as found on disk, if any */
  readonly snapshotOnDisk: StatusSnapshot | undefined;
  /** Snapshot recomputed from the event log */
  readonly recomputed: StatusSnapshot;
  /** Line errors from reading the log */
  readonly schemaErrors?: readonly LineError[];
  readonly stale: StaleClaimOptions;
}

export interface DoctorResult {
  readonly feature: string;
  readonly findings: readonly DoctorFinding[];
  /** No findings at all */
  readonly healthy: boolean;
  /** At least one error-severity finding */
  readonly hasErrors: boolean;
}
