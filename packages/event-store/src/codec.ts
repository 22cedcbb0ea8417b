/**
 * @lanekeeper/event-store — JSONL codec.
 *
 * One canonical JSON object per line, newline-terminated. Parsing never
 * throws: each bad line becomes a LineError and the rest are still read.
 */

import type { StatusEvent } from "@lanekeeper/types";
import type { LineError, ReadResult } from "./types.js";
import { toCanonicalJson } from "./canonical.js";
import { validateStatusEvent } from "./schema.js";

export function serializeEvent(event: StatusEvent): string {
  return toCanonicalJson(event);
}

/** Serialize events as JSONL, one line each, in the given order. */
export function serializeLog(events: readonly StatusEvent[]): string {
  return events.map((event) => `${serializeEvent(event)}\n`).join("");
}

/**
 * Parse JSONL content. Blank lines are ignored.
 */
export function parseLog(content: string): ReadResult {
  const events: StatusEvent[] = [];
  const errors: LineError[] = [];
  const lines = content.split("\n");

  for (let i = 0; i < lines.length; i++) {
    const trimmed = (lines[i] ?? "").trim();
    if (trimmed.length === 0) {
      continue;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      errors.push({ line: i + 1, message: `Invalid JSON: ${detail}` });
      continue;
    }

    const result = validateStatusEvent(raw);
    if (result.ok) {
      events.push(result.event);
    } else {
      errors.push({ line: i + 1, message: result.issues.join("; ") });
    }
  }

  return { events, errors };
}
