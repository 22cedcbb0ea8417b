/**
 * Materialized Status Types
 *
 * Everything here is derived by replaying the event log. None of it is
 * authoritative and none of it is ever edited by hand.
 */

import type { Lane } from "./lane.js";
import type { StatusEventType } from "./event.js";

/**
 * A transition that failed its guard condition.
 *
 * Recorded and reported, never applied.
 */
export interface GuardViolation {
  readonly eventId: string;
  readonly wp: string;
  readonly actor: string;
  readonly currentLane: Lane;
  readonly attemptedEventType: StatusEventType;
  /** Lane the event tried to enter, when it names one */
  readonly targetLane?: Lane;
  readonly reason: string;
}

/**
 * A forward event that lost to a concurrent reviewer rollback.
 *
 * Superseded events stay in the log and the audit trail; they are not
 * violations.
 */
export interface Supersession {
  readonly eventId: string;
  readonly wp: string;
  readonly supersededBy: string;
  readonly reason: string;
}

/**
 * Two concurrent forced transitions with no rollback precedence between
 * them. Needs a human decision.
 */
export interface MergeAmbiguity {
  readonly wp: string;
  readonly fromLane: Lane;
  /** Parallel arrays, one entry per contending event */
  readonly eventIds: readonly string[];
  readonly eventTypes: readonly StatusEventType[];
  readonly actors: readonly string[];
  readonly targetLanes: readonly Lane[];
  readonly reason: string;
}

export type AuditOutcome = "applied" | "rejected" | "superseded" | "annotated";

/** One replayed event and what the reducer did with it. */
export interface AuditEntry {
  readonly eventId: string;
  readonly wp: string;
  readonly eventType: StatusEventType;
  readonly actor: string;
  readonly lamportClock: number;
  readonly laneBefore: Lane;
  readonly laneAfter: Lane;
  readonly outcome: AuditOutcome;
}

/** Current state of one work package. */
export interface WorkPackageStatus {
  readonly wp: string;
  readonly lane: Lane;
  readonly claimant?: string;
  /** Unset until an event for this WP is accepted */
  readonly lastEventId?: string;
  readonly lastTransitionAt?: string;
  readonly lastActor?: string;
  /** Clock of the last accepted event, 0 when none was */
  readonly lamportClock: number;
  readonly forceCount: number;
  readonly violations: readonly GuardViolation[];
}

/** Materialized state of every work package in a feature (status.json). */
export interface StatusSnapshot {
  readonly feature: string;
  readonly eventCount: number;
  readonly lastEventId: string | null;
  readonly workPackages: Readonly<Record<string, WorkPackageStatus>>;
  readonly summary: Readonly<Record<Lane, number>>;
  readonly audit: readonly AuditEntry[];
  readonly violations: readonly GuardViolation[];
  readonly superseded: readonly Supersession[];
}
