/**
 * @lanekeeper/types — Shared domain types for the status stack.
 *
 * These types are used across all lanekeeper packages:
 * - Lanes and lane aliases
 * - Status event envelope and payload variants
 * - Evidence attached to completed work
 * - Materialized snapshot, violations and audit trail
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Lane types
export type { Lane, LaneAlias } from "./lane.js";
export {
  LANES,
  TERMINAL_LANES,
  LANE_ALIASES,
  LANE_PROGRESSION,
  isTerminalLane,
  laneRank,
} from "./lane.js";

// Event types
export type {
  AggregateId,
  StatusEventType,
  ClaimedPayload,
  StateEnteredPayload,
  ReviewRequestedPayload,
  ReviewRejectedPayload,
  CompletedPayload,
  BlockedPayload,
  UnblockedPayload,
  CanceledPayload,
  ForcedTransitionPayload,
  CommitRef,
  ReconciliationAppliedPayload,
  AnnotatedPayload,
  StatusEventPayloads,
  StatusEventEnvelope,
  StatusEvent,
  StatusEventOf,
} from "./event.js";

// Evidence types
export type {
  RepoEvidence,
  VerificationOutcome,
  VerificationRecord,
  ReviewVerdict,
  ReviewRecord,
  Evidence,
} from "./evidence.js";

// Materialized status types
export type {
  GuardViolation,
  Supersession,
  MergeAmbiguity,
  AuditOutcome,
  AuditEntry,
  WorkPackageStatus,
  StatusSnapshot,
} from "./status.js";

// Runtime type guards
export {
  isLane,
  resolveLaneAlias,
  isStatusEventType,
  isAggregateId,
  isApprovedReview,
  isGuardViolation,
  isStatusSnapshot,
} from "./guards.js";
