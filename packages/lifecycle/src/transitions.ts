/**
 * @lanekeeper/lifecycle — Work package state machine.
 *
 * Seven lanes, two of them terminal. Every lane change is an edge in
 * VALID_TRANSITIONS, driven by a specific event type and protected by a
 * guard on the event's payload.
 *
 * Rules:
 * - Annotated events never change the lane and are always accepted
 * - Terminal lanes (done, canceled) are immutable
 * - A WP has at most one active claim
 * - ForcedTransition skips the edge guard, never the edge table
 * - A failed check is returned as a GuardViolation, never thrown
 */

import type {
  GuardViolation,
  Lane,
  ReviewRecord,
  StatusEvent,
  StatusEventType,
} from "@lanekeeper/types";
import { isApprovedReview, isTerminalLane } from "@lanekeeper/types";

// =============================================================================
// Transition table
// =============================================================================

export const VALID_TRANSITIONS: Readonly<Record<Lane, readonly Lane[]>> = {
  planned: ["claimed", "blocked", "canceled"],
  claimed: ["in_progress", "blocked", "canceled"],
  in_progress: ["for_review", "planned", "blocked", "canceled"],
  for_review: ["done", "in_progress", "blocked", "canceled"],
  done: [],
  blocked: ["in_progress", "canceled"],
  canceled: [],
};

export function isValidTransition(from: Lane, to: Lane): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Lane an event tries to move its WP into. Undefined for Annotated.
 */
export function targetLaneOf(event: StatusEvent): Lane | undefined {
  switch (event.eventType) {
    case "Claimed":
      return "claimed";
    case "StateEntered":
      return event.payload.lane;
    case "ReviewRequested":
      return "for_review";
    case "ReviewRejected":
    case "Unblocked":
      return "in_progress";
    case "Completed":
      return "done";
    case "Blocked":
      return "blocked";
    case "Canceled":
      return "canceled";
    case "ForcedTransition":
    case "ReconciliationApplied":
      return event.payload.toLane;
    case "Annotated":
      return undefined;
  }
}

/** True for events that bypass or loosen a guard and must carry a reason. */
export function isForcedEvent(event: StatusEvent): boolean {
  return (
    event.eventType === "ForcedTransition" ||
    (event.eventType === "ReviewRequested" && event.payload.force === true)
  );
}

// =============================================================================
// Drivers
// =============================================================================

type EdgePredicate = (from: Lane, to: Lane) => boolean;

const edge =
  (...pairs: readonly (readonly [Lane, Lane])[]): EdgePredicate =>
  (from, to) =>
    pairs.some(([f, t]) => f === from && t === to);

/** Which edges each event type may drive (the edge itself must also be valid). */
const DRIVERS: Readonly<Record<StatusEventType, EdgePredicate>> = {
  Claimed: edge(["planned", "claimed"]),
  StateEntered: edge(
    ["claimed", "in_progress"],
    ["blocked", "in_progress"],
    ["in_progress", "planned"],
  ),
  ReviewRequested: edge(["in_progress", "for_review"]),
  ReviewRejected: edge(["for_review", "in_progress"]),
  Completed: edge(["for_review", "done"]),
  Blocked: (_from, to) => to === "blocked",
  Unblocked: edge(["blocked", "in_progress"]),
  Canceled: (_from, to) => to === "canceled",
  ForcedTransition: () => true,
  ReconciliationApplied: () => true,
  Annotated: () => false,
};

// =============================================================================
// Guards
// =============================================================================

/** Guard-relevant facts pulled out of an event. */
interface GuardInput {
  readonly assignee?: string;
  readonly workspaceRef?: string;
  readonly subtasksComplete: boolean;
  readonly force: boolean;
  readonly reason?: string;
  readonly review?: ReviewRecord;
  readonly reviewRef?: string;
}

function guardInputOf(event: StatusEvent): GuardInput {
  const base = { reason: event.reason, subtasksComplete: false, force: false };
  switch (event.eventType) {
    case "Claimed":
      return { ...base, assignee: event.payload.assignee };
    case "StateEntered":
      return { ...base, workspaceRef: event.payload.workspaceRef };
    case "ReviewRequested":
      return {
        ...base,
        subtasksComplete: event.payload.subtasksComplete,
        force: event.payload.force === true,
      };
    case "ReviewRejected":
      return { ...base, reviewRef: event.payload.reviewRef };
    case "Completed":
      return { ...base, review: event.payload.evidence.review };
    case "ReconciliationApplied":
      return {
        ...base,
        assignee: event.payload.assignee ?? event.actor,
        workspaceRef: event.payload.workspaceRef,
        subtasksComplete: event.payload.subtasksComplete === true,
      };
    default:
      return base;
  }
}

function present(value: string | undefined): boolean {
  return value !== undefined && value.trim().length > 0;
}

/**
 * Edge guards. Returns a failure reason, or undefined when the guard holds.
 */
type Guard = (input: GuardInput, context: TransitionContext) => string | undefined;

const GUARDS: Partial<Record<`${Lane}->${Lane}`, Guard>> = {
  "planned->claimed": (input, ctx) => {
    if (!present(input.assignee)) return "claim requires an assignee";
    if (ctx.claimant !== undefined) {
      return `conflicting active claim: already claimed by ${ctx.claimant}`;
    }
    return undefined;
  },
  "claimed->in_progress": (input) =>
    present(input.workspaceRef) ? undefined : "starting work requires a workspace reference",
  "in_progress->for_review": (input) => {
    if (input.subtasksComplete) return undefined;
    if (input.force && present(input.reason)) return undefined;
    return "subtasks incomplete; review requires completed subtasks or force with a reason";
  },
  "for_review->done": (input) =>
    isApprovedReview(input.review)
      ? undefined
      : "completion requires an approved review naming the reviewer",
  "for_review->in_progress": (input) =>
    present(input.reviewRef) ? undefined : "rollback from review requires a reviewRef",
  "in_progress->planned": (input) =>
    present(input.reason) ? undefined : "returning work to planned requires a reason",
};

// =============================================================================
// Validation
// =============================================================================

export interface TransitionContext {
  /** Active claimant recorded for the WP, if any */
  readonly claimant?: string;
}

export type TransitionResult =
  | { readonly ok: true; readonly lane: Lane }
  | { readonly ok: false; readonly violation: GuardViolation };

/**
 * Check whether `event` may move a WP out of `currentLane`.
 *
 * Checks, in order: annotation, terminal lane, active claim, edge table,
 * event type vs edge, then the edge guard (skipped for ForcedTransition).
 */
export function validateTransition(
  currentLane: Lane,
  event: StatusEvent,
  context: TransitionContext = {},
): TransitionResult {
  if (event.eventType === "Annotated") {
    return { ok: true, lane: currentLane };
  }

  const target = targetLaneOf(event) ?? currentLane;
  const reject = (reason: string): TransitionResult => ({
    ok: false,
    violation: {
      eventId: event.eventId,
      wp: event.aggregateId.wp,
      actor: event.actor,
      currentLane,
      attemptedEventType: event.eventType,
      targetLane: target,
      reason,
    },
  });

  if (isTerminalLane(currentLane)) {
    return reject(`lane ${currentLane} is terminal; only annotations are accepted`);
  }

  if (event.eventType === "Claimed" && context.claimant !== undefined) {
    return reject(`conflicting active claim: already claimed by ${context.claimant}`);
  }

  if (!isValidTransition(currentLane, target)) {
    return reject(`illegal transition ${currentLane} -> ${target}`);
  }

  if (!DRIVERS[event.eventType](currentLane, target)) {
    return reject(`${event.eventType} cannot drive ${currentLane} -> ${target}`);
  }

  if (event.eventType === "ForcedTransition") {
    return { ok: true, lane: target };
  }

  const key: `${Lane}->${Lane}` = `${currentLane}->${target}`;
  const guard = GUARDS[key];
  const failure = guard?.(guardInputOf(event), context);
  return failure === undefined ? { ok: true, lane: target } : reject(failure);
}
