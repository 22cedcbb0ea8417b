/**
 * @lanekeeper/merge — Canonical event order.
 *
 * Events are ordered by (lamportClock, at, eventId). The wall-clock `at`
 * is only a tiebreaker and is compared as an instant; if either side does
 * not parse, the raw strings are compared instead. eventId is unique, so
 * the order is total.
 */

import type { StatusEvent } from "@lanekeeper/types";
import { toCanonicalJson } from "@lanekeeper/event-store";

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareInstants(a: string, b: string): number {
  const ta = Date.parse(a);
  const tb = Date.parse(b);
  if (Number.isNaN(ta) || Number.isNaN(tb)) {
    return compareStrings(a, b);
  }
  return ta - tb;
}

export function compareEvents(a: StatusEvent, b: StatusEvent): number {
  if (a.lamportClock !== b.lamportClock) {
    return a.lamportClock - b.lamportClock;
  }
  const byTime = compareInstants(a.at, b.at);
  if (byTime !== 0) return byTime;
  return compareStrings(a.eventId, b.eventId);
}

/**
 * Keep one copy per eventId.
 *
 * Copies of the same event normally serialize identically. If they do not,
 * the copy with the lexicographically smaller canonical JSON is kept, so
 * the choice does not depend on which log was read first.
 */
export function dedupeEvents(events: readonly StatusEvent[]): StatusEvent[] {
  const kept = new Map<string, { event: StatusEvent; canonical: string }>();
  for (const event of events) {
    const canonical = toCanonicalJson(event);
    const existing = kept.get(event.eventId);
    if (existing === undefined || canonical < existing.canonical) {
      kept.set(event.eventId, { event, canonical });
    }
  }
  return [...kept.values()].map((entry) => entry.event);
}

export function sortEvents(events: readonly StatusEvent[]): StatusEvent[] {
  return [...events].sort(compareEvents);
}

/** Deduplicate, then sort into canonical order. */
export function canonicalOrder(events: readonly StatusEvent[]): StatusEvent[] {
  return sortEvents(dedupeEvents(events));
}
