/**
 * Reconciliation types.
 *
 * Scans arrive as plain data; this package never runs git itself. The
 * caller lists branches and commits however it likes and hands them over.
 */

import type { Lane, StatusEvent } from "@lanekeeper/types";
import type { StatusLog } from "@lanekeeper/event-store";

// =============================================================================
// Scan input
// =============================================================================

export interface CommitInfo {
  readonly sha: string;
  /** First line of the commit message */
  readonly message: string;
  readonly author: string;
  /** ISO 8601 */
  readonly date: string;
}

export interface BranchScan {
  readonly name: string;
  readonly head: CommitInfo;
  /** Whether the branch has been merged into the main line */
  readonly merged: boolean;
}

export interface CommitScan extends CommitInfo {
  readonly branch: string;
}

/** Everything found in one target repository. */
export interface RepoScan {
  readonly repo: string;
  readonly branches: readonly BranchScan[];
  readonly commits: readonly CommitScan[];
  /** Set when the repository could not be scanned */
  readonly error?: string;
}

// =============================================================================
// Findings
// =============================================================================

/** A commit linked to a WP, with the repo it came from. */
export interface WpCommit extends CommitScan {
  readonly repo: string;
}

export interface ScanFindings {
  /** WP → commits, deduplicated by sha, in discovery order */
  readonly commits: ReadonlyMap<string, readonly WpCommit[]>;
  /** WPs with at least one merged branch */
  readonly merged: ReadonlySet<string>;
  readonly reposScanned: number;
  readonly errors: readonly string[];
}

/** A lane change the evidence calls for. */
export interface DriftPlan {
  readonly wp: string;
  readonly from: Lane;
  readonly to: Lane;
  readonly summary: string;
  readonly commits: readonly WpCommit[];
}

// =============================================================================
// Options & result
// =============================================================================

export interface ReconcileOptions {
  /** Propose without appending (default true) */
  readonly dryRun?: boolean;
  /** Log to append to when dryRun is false */
  readonly log?: StatusLog;
  /** Highest Lamport clock already in the log; proposals continue from it */
  readonly lamportFloor?: number;
  readonly now?: () => Date;
}

export interface ReconcileResult {
  readonly feature: string;
  readonly proposedEvents: readonly StatusEvent[];
  readonly driftDetected: boolean;
  readonly details: readonly string[];
  readonly errors: readonly string[];
  readonly reposScanned: number;
  readonly wpsAnalyzed: number;
  /** Events appended to the log (0 on a dry run) */
  readonly applied: number;
}

export type ReconcileErrorCode = "LOG_REQUIRED";

export class ReconcileError extends Error {
  constructor(
    public readonly code: ReconcileErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ReconcileError";
  }
}
