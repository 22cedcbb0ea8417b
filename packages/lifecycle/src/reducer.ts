/**
 * @lanekeeper/lifecycle — Reducer.
 *
 * Replays an ordered event sequence into a StatusSnapshot.
 *
 * Rules:
 * - Events are applied strictly in the given order
 * - A WP that has no events yet is in `planned`
 * - Bookkeeping fields (last event, actor, clock) move only on accepted events
 * - A rejected event leaves the lane untouched but is kept in the audit
 *   trail and in `violations`
 * - A superseded event is neither applied nor a violation
 * - Pure: no clock, no I/O; the same input always yields the same snapshot
 */

import type {
  AuditEntry,
  AuditOutcome,
  GuardViolation,
  Lane,
  StatusEvent,
  StatusSnapshot,
  Supersession,
  WorkPackageStatus,
} from "@lanekeeper/types";
import { isForcedEvent, validateTransition } from "./transitions.js";

export interface ReduceOptions {
  /** Superseded event ID → ID of the event that superseded it */
  readonly superseded?: ReadonlyMap<string, string>;
  /** Feature name for an empty sequence (otherwise taken from the events) */
  readonly feature?: string;
}

export interface ReduceResult {
  readonly snapshot: StatusSnapshot;
  readonly violations: readonly GuardViolation[];
}

interface MutableWpState {
  wp: string;
  lane: Lane;
  claimant: string | undefined;
  lastEventId: string | undefined;
  lastTransitionAt: string | undefined;
  lastActor: string | undefined;
  lamportClock: number;
  forceCount: number;
  violations: GuardViolation[];
}

function initialState(wp: string): MutableWpState {
  return {
    wp,
    lane: "planned",
    claimant: undefined,
    lastEventId: undefined,
    lastTransitionAt: undefined,
    lastActor: undefined,
    lamportClock: 0,
    forceCount: 0,
    violations: [],
  };
}

/** Claimant after `event` moved the WP into `lane`. */
function nextClaimant(state: MutableWpState, event: StatusEvent, lane: Lane): string | undefined {
  if (lane === "planned") return undefined;
  if (event.eventType === "Claimed") return event.payload.assignee;
  if (
    lane === "claimed" &&
    (event.eventType === "ForcedTransition" || event.eventType === "ReconciliationApplied")
  ) {
    return event.payload.assignee ?? event.actor;
  }
  return state.claimant;
}

function freeze(state: MutableWpState): WorkPackageStatus {
  return {
    wp: state.wp,
    lane: state.lane,
    ...(state.claimant !== undefined ? { claimant: state.claimant } : {}),
    ...(state.lastEventId !== undefined ? { lastEventId: state.lastEventId } : {}),
    ...(state.lastTransitionAt !== undefined ? { lastTransitionAt: state.lastTransitionAt } : {}),
    ...(state.lastActor !== undefined ? { lastActor: state.lastActor } : {}),
    lamportClock: state.lamportClock,
    forceCount: state.forceCount,
    violations: state.violations,
  };
}

export function emptySummary(): Record<Lane, number> {
  return {
    planned: 0,
    claimed: 0,
    in_progress: 0,
    for_review: 0,
    done: 0,
    blocked: 0,
    canceled: 0,
  };
}

/**
 * Replay `events` in order.
 */
export function reduce(
  events: readonly StatusEvent[],
  options: ReduceOptions = {},
): ReduceResult {
  const superseded = options.superseded ?? new Map<string, string>();
  const states = new Map<string, MutableWpState>();
  const audit: AuditEntry[] = [];
  const violations: GuardViolation[] = [];
  const supersessions: Supersession[] = [];

  for (const event of events) {
    const wp = event.aggregateId.wp;
    let state = states.get(wp);
    if (state === undefined) {
      state = initialState(wp);
      states.set(wp, state);
    }

    const laneBefore = state.lane;
    let outcome: AuditOutcome;

    const supersededBy = superseded.get(event.eventId);
    if (supersededBy !== undefined) {
      outcome = "superseded";
      supersessions.push({
        eventId: event.eventId,
        wp,
        supersededBy,
        reason: `superseded by concurrent rollback ${supersededBy}`,
      });
    } else {
      const result = validateTransition(state.lane, event, { claimant: state.claimant });
      if (!result.ok) {
        outcome = "rejected";
        violations.push(result.violation);
        state.violations.push(result.violation);
      } else if (event.eventType === "Annotated") {
        outcome = "annotated";
        state.lastEventId = event.eventId;
        state.lastActor = event.actor;
        state.lamportClock = event.lamportClock;
      } else {
        outcome = "applied";
        state.claimant = nextClaimant(state, event, result.lane);
        state.lane = result.lane;
        state.lastEventId = event.eventId;
        state.lastTransitionAt = event.at;
        state.lastActor = event.actor;
        state.lamportClock = event.lamportClock;
        if (isForcedEvent(event)) state.forceCount += 1;
      }
    }

    audit.push({
      eventId: event.eventId,
      wp,
      eventType: event.eventType,
      actor: event.actor,
      lamportClock: event.lamportClock,
      laneBefore,
      laneAfter: state.lane,
      outcome,
    });
  }

  const summary = emptySummary();
  const workPackages: Record<string, WorkPackageStatus> = {};
  for (const wp of [...states.keys()].sort()) {
    const state = states.get(wp);
    if (state === undefined) continue;
    workPackages[wp] = freeze(state);
    summary[state.lane] += 1;
  }

  const last = events[events.length - 1];
  const snapshot: StatusSnapshot = {
    feature: options.feature ?? events[0]?.aggregateId.feature ?? "",
    eventCount: events.length,
    lastEventId: last?.eventId ?? null,
    workPackages,
    summary,
    audit,
    violations,
    superseded: supersessions,
  };

  return { snapshot, violations };
}
