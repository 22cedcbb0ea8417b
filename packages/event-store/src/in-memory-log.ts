/**
 * @lanekeeper/event-store — In-memory status log.
 *
 * Keeps each feature's log as serialized lines, so reads go through the
 * same codec as the file-backed log. For tests and dry runs.
 */

import type { StatusEvent } from "@lanekeeper/types";
import type {
  AppendResult,
  AppendWithResult,
  EventBuilder,
  ReadResult,
  StatusLog,
  WriteMergedResult,
} from "./types.js";
import { AppendError } from "./types.js";
import { parseLog, serializeEvent } from "./codec.js";
import { requireStatusEvent } from "./schema.js";

export class InMemoryStatusLog implements StatusLog {
  /** feature → serialized lines, newline-terminated */
  private readonly _lines = new Map<string, string[]>();

  append(event: unknown): AppendResult {
    const valid = requireStatusEvent(event);
    const feature = valid.aggregateId.feature;
    this._push(feature, valid);
    return { feature, eventId: valid.eventId, location: "memory" };
  }

  /** Single-threaded, so the read and the push cannot interleave with another append. */
  appendWith(feature: string, build: EventBuilder): AppendWithResult {
    const previous = this.readAll(feature);
    const event = requireStatusEvent(build(previous), feature);
    this._push(feature, event);
    return { feature, eventId: event.eventId, location: "memory", event, previous };
  }

  readAll(feature: string): ReadResult {
    return parseLog(this.readRaw(feature) ?? "");
  }

  readRaw(feature: string): string | undefined {
    return this._lines.get(feature)?.join("");
  }

  /**
   * Append a raw line without validation, e.g. to simulate a torn write.
   */
  appendRaw(feature: string, line: string): void {
    const lines = this._lines.get(feature) ?? [];
    lines.push(line.endsWith("\n") ? line : `${line}\n`);
    this._lines.set(feature, lines);
  }

  writeMerged(feature: string, events: readonly StatusEvent[]): WriteMergedResult {
    const current = this.readAll(feature);
    if (current.errors.length > 0) {
      throw new AppendError(
        "HISTORY_LOSS",
        `Log for ${feature} has ${current.errors.length} unreadable line(s)`,
        feature,
      );
    }
    const incoming = new Set(events.map((e) => e.eventId));
    const missing = current.events.filter((e) => !incoming.has(e.eventId));
    if (missing.length > 0) {
      throw new AppendError(
        "HISTORY_LOSS",
        `Merged log for ${feature} is missing ${missing.length} existing event(s)`,
        feature,
      );
    }

    this._lines.set(
      feature,
      events.map((e) => `${serializeEvent(e)}\n`),
    );
    return { feature, eventCount: events.length, location: "memory" };
  }

  /** Features with at least one line. */
  features(): string[] {
    return [...this._lines.keys()].sort();
  }

  private _push(feature: string, event: StatusEvent): void {
    let lines = this._lines.get(feature);
    if (lines === undefined) {
      lines = [];
      this._lines.set(feature, lines);
    }
    lines.push(`${serializeEvent(event)}\n`);
  }
}
