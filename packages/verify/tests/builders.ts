/**
 * Event builders for verification tests.
 *
 * `n` is both the Lamport clock and the ID suffix; `at` is n seconds past
 * 2026-01-05T10:00:00Z.
 */

import type { Lane, StatusEvent } from "@lanekeeper/types";

export const FEATURE = "034-parallel";

export function eventId(n: number): string {
  return `01J${String(n).padStart(23, "0")}`;
}

function envelope(n: number, fromLane: Lane, actor = "agent-1", clock = n) {
  return {
    eventId: eventId(n),
    aggregateId: { feature: FEATURE, wp: "WP01" },
    fromLane,
    lamportClock: clock,
    at: new Date(Date.UTC(2026, 0, 5, 10, 0, n)).toISOString(),
    actor,
  };
}

export function claim(n: number): StatusEvent {
  return { ...envelope(n, "planned"), eventType: "Claimed", payload: { assignee: "agent-1" } };
}

export function start(n: number): StatusEvent {
  return {
    ...envelope(n, "claimed"),
    eventType: "StateEntered",
    payload: { lane: "in_progress", workspaceRef: "wt/WP01" },
  };
}

export function completeFrom(n: number, fromLane: Lane): StatusEvent {
  return {
    ...envelope(n, fromLane, "reviewer-1"),
    eventType: "Completed",
    payload: {
      evidence: {
        repos: [],
        verification: [],
        review: { reviewer: "reviewer-1", verdict: "approved", reference: "PR#7" },
      },
    },
  };
}

export function force(n: number, toLane: Exclude<Lane, "done">, clock = n): StatusEvent {
  return {
    ...envelope(n, "in_progress", "lead", clock),
    reason: "manual override",
    eventType: "ForcedTransition",
    payload: { toLane },
  };
}
