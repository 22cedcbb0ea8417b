/**
 * Event Types
 *
 * Append-only event architecture.
 * Every lane change of a work package is captured as a StatusEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event carries who, when (wall clock and Lamport clock) and why
 * - Events are replayable: same ordered events → same snapshot
 * - No UPDATE, no DELETE — corrections are new events
 */

import type { Evidence } from "./evidence.js";
import type { Lane } from "./lane.js";

/** Identifies a work package and its owning feature. */
export interface AggregateId {
  /** Feature slug, e.g. "034-parallel-worktrees" */
  readonly feature: string;
  /** Work package ID, e.g. "WP01" */
  readonly wp: string;
}

export type StatusEventType =
  | "Claimed"
  | "StateEntered"
  | "ReviewRequested"
  | "ReviewRejected"
  | "Completed"
  | "Blocked"
  | "Unblocked"
  | "Canceled"
  | "ForcedTransition"
  | "ReconciliationApplied"
  | "Annotated";

// =============================================================================
// Payloads
// =============================================================================

export interface ClaimedPayload {
  readonly assignee: string;
}

export interface StateEnteredPayload {
  readonly lane: "in_progress" | "planned";
  /** Worktree or execution-context reference (required to start work) */
  readonly workspaceRef?: string;
}

export interface ReviewRequestedPayload {
  readonly subtasksComplete: boolean;
  /** Submit for review with incomplete subtasks (requires a reason) */
  readonly force?: boolean;
}

export interface ReviewRejectedPayload {
  readonly reviewRef: string;
}

export interface CompletedPayload {
  readonly evidence: Evidence;
}

export interface BlockedPayload {
  readonly blocker?: string;
}

export interface UnblockedPayload {
  readonly resolution?: string;
}

export interface CanceledPayload {
  readonly note?: string;
}

export interface ForcedTransitionPayload {
  /** Forced transitions may not enter `done`; that requires evidence. */
  readonly toLane: Exclude<Lane, "done">;
  readonly reviewRef?: string;
  readonly assignee?: string;
}

/** A commit that reconciliation used as implementation evidence. */
export interface CommitRef {
  readonly repo: string;
  readonly sha: string;
  readonly branch: string;
}

export interface ReconciliationAppliedPayload {
  readonly toLane: Lane;
  readonly commits: readonly CommitRef[];
  readonly assignee?: string;
  readonly workspaceRef?: string;
  readonly subtasksComplete?: boolean;
}

export interface AnnotatedPayload {
  readonly note: string;
}

/** Maps each event type to its payload shape. */
export interface StatusEventPayloads {
  readonly Claimed: ClaimedPayload;
  readonly StateEntered: StateEnteredPayload;
  readonly ReviewRequested: ReviewRequestedPayload;
  readonly ReviewRejected: ReviewRejectedPayload;
  readonly Completed: CompletedPayload;
  readonly Blocked: BlockedPayload;
  readonly Unblocked: UnblockedPayload;
  readonly Canceled: CanceledPayload;
  readonly ForcedTransition: ForcedTransitionPayload;
  readonly ReconciliationApplied: ReconciliationAppliedPayload;
  readonly Annotated: AnnotatedPayload;
}

// =============================================================================
// Envelope
// =============================================================================

/**
 * Envelope shared by every status event.
 */
export interface StatusEventEnvelope<TType extends StatusEventType> {
  /** ULID; lexicographically sortable, final ordering tiebreaker */
  readonly eventId: string;

  readonly eventType: TType;

  readonly aggregateId: AggregateId;

  /** Lane the emitter observed when emitting */
  readonly fromLane: Lane;

  /** max(local counter, max clock seen in log) + 1 at emission */
  readonly lamportClock: number;

  /** ISO 8601 wall-clock time; informational tiebreaker only */
  readonly at: string;

  /** Agent or human that emitted the event */
  readonly actor: string;

  readonly payload: StatusEventPayloads[TType];

  /** Required for forced or guard-bypassing transitions */
  readonly reason?: string;
}

/**
 * A status event. Discriminated by `eventType`.
 */
export type StatusEvent = {
  [K in StatusEventType]: StatusEventEnvelope<K>;
}[StatusEventType];

export type StatusEventOf<TType extends StatusEventType> = Extract<
  StatusEvent,
  { readonly eventType: TType }
>;
