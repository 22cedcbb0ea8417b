/**
 * @lanekeeper/merge — Rollback-aware precedence.
 *
 * Runs over the canonically ordered events before reduction and decides
 * which events lose to a concurrent reviewer rollback.
 *
 * Two events of one WP are *concurrent alternatives* when they leave the
 * same lane and neither emitter had seen the other: `b` is causally after
 * `a` only if b has the higher Lamport clock AND the WP re-entered b's
 * `fromLane` between them (some event targets that lane with a clock
 * strictly between a's and b's).
 *
 * Among concurrent alternatives leaving for_review or in_progress, a single
 * rollback (backward move carrying a reviewRef) supersedes every forward
 * alternative that carries no reviewRef. "Most advanced lane wins" is
 * never used.
 *
 * Concurrent forced transitions from the same lane to different lanes,
 * with no rollback deciding between them, are reported as ambiguities.
 */

import type { Lane, MergeAmbiguity, StatusEvent } from "@lanekeeper/types";
import { laneRank } from "@lanekeeper/types";
import { isForcedEvent, targetLaneOf } from "@lanekeeper/lifecycle";

export interface PrecedenceResult {
  /** Superseded event ID → superseding rollback event ID */
  readonly superseded: ReadonlyMap<string, string>;
  readonly ambiguities: readonly MergeAmbiguity[];
}

interface Candidate {
  readonly event: StatusEvent;
  readonly target: Lane;
}

const ROLLBACK_SOURCES: ReadonlySet<Lane> = new Set<Lane>(["for_review", "in_progress"]);

function reviewRefOf(event: StatusEvent): string | undefined {
  if (event.eventType === "ReviewRejected" || event.eventType === "ForcedTransition") {
    const ref = event.payload.reviewRef;
    return ref !== undefined && ref.trim().length > 0 ? ref : undefined;
  }
  return undefined;
}

function direction(from: Lane, to: Lane): "forward" | "backward" | "sideways" {
  const a = laneRank(from);
  const b = laneRank(to);
  if (a === undefined || b === undefined || a === b) return "sideways";
  return b > a ? "forward" : "backward";
}

function isRollback(c: Candidate): boolean {
  return (
    ROLLBACK_SOURCES.has(c.event.fromLane) &&
    reviewRefOf(c.event) !== undefined &&
    direction(c.event.fromLane, c.target) === "backward"
  );
}

function isPlainForward(c: Candidate): boolean {
  return reviewRefOf(c.event) === undefined && direction(c.event.fromLane, c.target) === "forward";
}

/**
 * True when `later` was emitted after its emitter saw the WP re-enter
 * `later.fromLane` following `earlier`.
 */
function isCausallyAfter(later: Candidate, earlier: Candidate, group: readonly Candidate[]): boolean {
  const lo = earlier.event.lamportClock;
  const hi = later.event.lamportClock;
  if (hi <= lo) return false;
  return group.some(
    (s) =>
      s.target === later.event.fromLane &&
      s.event.lamportClock > lo &&
      s.event.lamportClock < hi,
  );
}

function areConcurrent(a: Candidate, b: Candidate, group: readonly Candidate[]): boolean {
  return (
    a.event.fromLane === b.event.fromLane &&
    !isCausallyAfter(a, b, group) &&
    !isCausallyAfter(b, a, group)
  );
}

function groupByWp(sorted: readonly StatusEvent[]): Map<string, Candidate[]> {
  const groups = new Map<string, Candidate[]>();
  for (const event of sorted) {
    const target = targetLaneOf(event);
    if (target === undefined) continue;
    const wp = event.aggregateId.wp;
    let group = groups.get(wp);
    if (group === undefined) {
      group = [];
      groups.set(wp, group);
    }
    group.push({ event, target });
  }
  return groups;
}

/**
 * Compute supersessions and ambiguities for canonically ordered events.
 */
export function resolveRollbackPrecedence(sorted: readonly StatusEvent[]): PrecedenceResult {
  const superseded = new Map<string, string>();
  const ambiguities: MergeAmbiguity[] = [];

  for (const [wp, group] of groupByWp(sorted)) {
    // ─── Rollback supersession ───────────────────────────────────────
    for (const rollback of group) {
      if (!isRollback(rollback)) continue;

      const alternatives = group.filter(
        (other) => other !== rollback && areConcurrent(rollback, other, group),
      );
      if (alternatives.some(isRollback)) continue;

      for (const alt of alternatives) {
        if (isPlainForward(alt) && !superseded.has(alt.event.eventId)) {
          superseded.set(alt.event.eventId, rollback.event.eventId);
        }
      }
    }

    // ─── Forced-transition ambiguity ─────────────────────────────────
    const forced = group.filter(
      (c) => isForcedEvent(c.event) && !superseded.has(c.event.eventId),
    );
    for (let i = 0; i < forced.length; i++) {
      for (let j = i + 1; j < forced.length; j++) {
        const a = forced[i];
        const b = forced[j];
        if (a === undefined || b === undefined) continue;
        if (a.target === b.target || !areConcurrent(a, b, group)) continue;
        ambiguities.push({
          wp,
          fromLane: a.event.fromLane,
          eventIds: [a.event.eventId, b.event.eventId],
          eventTypes: [a.event.eventType, b.event.eventType],
          actors: [a.event.actor, b.event.actor],
          targetLanes: [a.target, b.target],
          reason: `concurrent forced transitions from ${a.event.fromLane} to ${a.target} and ${b.target}`,
        });
      }
    }
  }

  return { superseded, ambiguities };
}
