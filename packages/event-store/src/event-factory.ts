/**
 * @lanekeeper/event-store — Event construction.
 *
 * Builds a complete event from a draft, filling in the ID and timestamp,
 * and validates it with the same schema the log uses on read. Lane names
 * in the payload may be aliases ("doing"); the event carries the canonical
 * lane.
 */

import type {
  LaneAlias,
  StatusEvent,
  StatusEventEnvelope,
  StatusEventPayloads,
  StatusEventType,
} from "@lanekeeper/types";
import { resolveLaneAlias } from "@lanekeeper/types";
import { validateStatusEvent } from "./schema.js";
import { SchemaError } from "./types.js";
import { createEventId } from "./event-id.js";

/** Payload as callers write it: lane fields also take an alias. */
export type PayloadInput<P> = {
  readonly [F in keyof P]: F extends "lane" | "toLane" ? P[F] | LaneAlias : P[F];
};

/**
 * An event of one type before it has an ID and a timestamp.
 *
 * Both may still be supplied, e.g. to rebuild a fixture deterministically.
 */
export type StatusEventInput<K extends StatusEventType> = Omit<
  StatusEventEnvelope<K>,
  "eventId" | "at" | "payload"
> & {
  readonly eventId?: string;
  readonly at?: string;
  readonly payload: PayloadInput<StatusEventPayloads[K]>;
};

export type StatusEventDraft = {
  [K in StatusEventType]: StatusEventInput<K>;
}[StatusEventType];

const LANE_FIELDS: ReadonlySet<string> = new Set(["lane", "toLane"]);

function canonicalPayload(payload: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(payload).map(([key, value]: [string, unknown]) => [
      key,
      LANE_FIELDS.has(key) && typeof value === "string" ? (resolveLaneAlias(value) ?? value) : value,
    ]),
  );
}

export interface CreateEventOptions {
  /** Clock used for the timestamp and the ID's time prefix */
  readonly now?: () => Date;
}

/**
 * Create a validated status event.
 *
 * @throws SchemaError when the resulting event is malformed
 */
export function createStatusEvent(
  draft: StatusEventDraft,
  options: CreateEventOptions = {},
): StatusEvent {
  const now = (options.now ?? (() => new Date()))();
  const candidate = {
    ...draft,
    eventId: draft.eventId ?? createEventId(now.getTime()),
    at: draft.at ?? now.toISOString(),
    payload: canonicalPayload(draft.payload),
  };

  const result = validateStatusEvent(candidate);
  if (!result.ok) {
    throw new SchemaError(result.issues, draft.aggregateId.feature);
  }
  return result.event;
}
