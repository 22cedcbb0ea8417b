/**
 * @lanekeeper/event-store — Event identifiers.
 *
 * Event IDs are ULIDs: 26 Crockford base32 characters whose prefix encodes
 * the creation time. IDs from one process are strictly increasing, even
 * within the same millisecond.
 */

import ulidModule from "ulid";
import { ULID_PATTERN } from "./schema.js";

const nextUlid = ulidModule.monotonicFactory();

/**
 * Create a new event ID.
 *
 * @param seedTime - Milliseconds since epoch to encode (defaults to now)
 */
export function createEventId(seedTime?: number): string {
  return nextUlid(seedTime);
}

export function isEventId(value: unknown): value is string {
  return typeof value === "string" && ULID_PATTERN.test(value);
}

/** Milliseconds since epoch encoded in an event ID. */
export function eventIdTime(eventId: string): number {
  return ulidModule.decodeTime(eventId);
}
