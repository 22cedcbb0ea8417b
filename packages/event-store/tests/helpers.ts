import type { StatusEvent } from "@lanekeeper/types";

export const FEATURE = "034-parallel";

/** Deterministic ULID-shaped ID for fixture number `n`. */
export function eventId(n: number): string {
  return `01J${String(n).padStart(23, "0")}`;
}

export function claimed(n: number, overrides: Partial<{ wp: string; actor: string; feature: string }> = {}): StatusEvent {
  const actor = overrides.actor ?? "agent-1";
  return {
    eventId: eventId(n),
    eventType: "Claimed",
    aggregateId: { feature: overrides.feature ?? FEATURE, wp: overrides.wp ?? "WP01" },
    fromLane: "planned",
    lamportClock: n,
    at: `2026-01-05T10:00:${String(n % 60).padStart(2, "0")}.000Z`,
    actor,
    payload: { assignee: actor },
  };
}

export function annotated(n: number, note = "checkpoint"): StatusEvent {
  return {
    eventId: eventId(n),
    eventType: "Annotated",
    aggregateId: { feature: FEATURE, wp: "WP01" },
    fromLane: "claimed",
    lamportClock: n,
    at: `2026-01-05T10:00:${String(n % 60).padStart(2, "0")}.000Z`,
    actor: "agent-1",
    payload: { note },
  };
}
