/**
 * Tests for rollback-aware precedence.
 */

import { describe, it, expect } from "vitest";
import { resolveRollbackPrecedence } from "../src/precedence.js";
import { canonicalOrder } from "../src/ordering.js";
import {
  annotate,
  complete,
  eventId,
  force,
  rejectReview,
  requestReview,
  toReview,
} from "../../lifecycle/tests/builders.js";

describe("resolveRollbackPrecedence", () => {
  it("lets a rollback supersede a concurrent completion with the same clock", () => {
    const events = canonicalOrder([
      ...toReview(1),
      complete(4),
      rejectReview(5, "fix-null-check", { clock: 4 }),
    ]);
    const { superseded, ambiguities } = resolveRollbackPrecedence(events);
    expect([...superseded]).toEqual([[eventId(4), eventId(5)]]);
    expect(ambiguities).toEqual([]);
  });

  it("lets a rollback supersede a concurrent completion with a higher clock", () => {
    const events = canonicalOrder([
      ...toReview(1),
      rejectReview(4, "fix-null-check"),
      annotate(5, "lgtm", { clock: 4 }),
      complete(6, undefined, { clock: 5 }),
    ]);
    const { superseded } = resolveRollbackPrecedence(events);
    expect(superseded.get(eventId(6))).toBe(eventId(4));
  });

  it("does not touch a completion made after the WP re-entered review", () => {
    const events = canonicalOrder([
      ...toReview(1),
      rejectReview(4, "fix-null-check"),
      requestReview(5),
      complete(6),
    ]);
    expect(resolveRollbackPrecedence(events).superseded.size).toBe(0);
  });

  it("resolves nothing between two concurrent rollbacks", () => {
    const events = canonicalOrder([
      ...toReview(1),
      rejectReview(4, "fix-a"),
      rejectReview(5, "fix-b", { clock: 4 }),
      complete(6, undefined, { clock: 4 }),
    ]);
    expect(resolveRollbackPrecedence(events).superseded.size).toBe(0);
  });

  it("counts a forced backward move with a reviewRef as a rollback", () => {
    const events = canonicalOrder([
      ...toReview(1),
      complete(4),
      force(5, "in_progress", { clock: 4, fromLane: "for_review", reviewRef: "hotfix" }),
    ]);
    expect(resolveRollbackPrecedence(events).superseded.get(eventId(4))).toBe(eventId(5));
  });

  it("keeps work packages independent", () => {
    const events = canonicalOrder([
      ...toReview(1, { wp: "WP01" }),
      ...toReview(4, { wp: "WP02" }),
      complete(7, undefined, { wp: "WP01" }),
      rejectReview(8, "fix", { wp: "WP02", clock: 7 }),
    ]);
    expect(resolveRollbackPrecedence(events).superseded.size).toBe(0);
  });

  it("reports concurrent forced transitions to different lanes", () => {
    const events = canonicalOrder([
      force(3, "planned", { fromLane: "in_progress" }),
      force(4, "blocked", { fromLane: "in_progress", clock: 3 }),
    ]);
    expect(resolveRollbackPrecedence(events).ambiguities).toEqual([
      {
        wp: "WP01",
        fromLane: "in_progress",
        eventIds: [eventId(3), eventId(4)],
        eventTypes: ["ForcedTransition", "ForcedTransition"],
        actors: ["lead", "lead"],
        targetLanes: ["planned", "blocked"],
        reason: "concurrent forced transitions from in_progress to planned and blocked",
      },
    ]);
  });

  it("does not report forced transitions that agree on the target", () => {
    const events = canonicalOrder([
      force(3, "blocked", { fromLane: "in_progress" }),
      force(4, "blocked", { fromLane: "in_progress", clock: 3 }),
    ]);
    expect(resolveRollbackPrecedence(events).ambiguities).toEqual([]);
  });
});
