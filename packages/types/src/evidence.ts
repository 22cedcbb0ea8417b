/**
 * Evidence Types
 *
 * Structured proof attached to `Completed` events. The review section is
 * optional at the type level; its absence is a guard failure, not a
 * structural one.
 */

/** Evidence of code changes in a repository. */
export interface RepoEvidence {
  readonly repo: string;
  readonly branch: string;
  /** 7-40 hex chars */
  readonly commit: string;
  readonly filesTouched: readonly string[];
}

export type VerificationOutcome = "pass" | "fail" | "skip";

/** Result of a verification command (test suite, linter, etc.). */
export interface VerificationRecord {
  readonly command: string;
  readonly result: VerificationOutcome;
  readonly summary: string;
}

export type ReviewVerdict = "approved" | "changes_requested";

/** Reviewer verdict on a work package. */
export interface ReviewRecord {
  readonly reviewer: string;
  readonly verdict: ReviewVerdict;
  readonly reference: string;
}

export interface Evidence {
  readonly repos: readonly RepoEvidence[];
  readonly verification: readonly VerificationRecord[];
  readonly review?: ReviewRecord;
}
