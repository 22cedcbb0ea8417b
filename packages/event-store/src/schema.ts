/**
 * @lanekeeper/event-store — Event schema.
 *
 * Every event is validated here before it is written, and every line is
 * validated here when the log is read back. Construction and parsing use
 * the same schema, so a malformed event never reaches the log.
 */

import { z } from "zod";
import type { StatusEvent } from "@lanekeeper/types";
import { SchemaError } from "./types.js";

// =============================================================================
// Primitives
// =============================================================================

/** Crockford base32, 26 characters */
export const ULID_PATTERN = /^[0-9A-HJKMNP-TV-Z]{26}$/;

/** Feature slugs become directory names: no separators, no dot-dot */
const FEATURE_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const nonBlank = z.string().refine((s) => s.trim().length > 0, {
  message: "must not be blank",
});

const LaneSchema = z.enum([
  "planned",
  "claimed",
  "in_progress",
  "for_review",
  "done",
  "blocked",
  "canceled",
]);

const AggregateIdSchema = z.object({
  feature: z.string().regex(FEATURE_PATTERN, "invalid feature slug"),
  wp: nonBlank,
});

// =============================================================================
// Evidence
// =============================================================================

const RepoEvidenceSchema = z.object({
  repo: nonBlank,
  branch: nonBlank,
  commit: z.string().regex(/^[0-9a-fA-F]{7,40}$/, "commit must be a 7-40 char hex sha"),
  filesTouched: z.array(z.string()).default([]),
});

const VerificationRecordSchema = z.object({
  command: nonBlank,
  result: z.enum(["pass", "fail", "skip"]),
  summary: z.string(),
});

const ReviewRecordSchema = z.object({
  reviewer: z.string(),
  verdict: z.enum(["approved", "changes_requested"]),
  reference: z.string(),
});

export const EvidenceSchema = z.object({
  repos: z.array(RepoEvidenceSchema).default([]),
  verification: z.array(VerificationRecordSchema).default([]),
  review: ReviewRecordSchema.optional(),
});

// =============================================================================
// Events
// =============================================================================

const envelope = {
  eventId: z.string().regex(ULID_PATTERN, "eventId must be a ULID"),
  aggregateId: AggregateIdSchema,
  fromLane: LaneSchema,
  lamportClock: z.number().int().min(1),
  at: z.string().datetime({ offset: true }),
  actor: nonBlank,
  reason: z.string().optional(),
};

const CommitRefSchema = z.object({
  repo: nonBlank,
  sha: nonBlank,
  branch: nonBlank,
});

const StatusEventUnion = z.discriminatedUnion("eventType", [
  z.object({
    ...envelope,
    eventType: z.literal("Claimed"),
    payload: z.object({ assignee: z.string() }),
  }),
  z.object({
    ...envelope,
    eventType: z.literal("StateEntered"),
    payload: z.object({
      lane: z.enum(["in_progress", "planned"]),
      workspaceRef: z.string().optional(),
    }),
  }),
  z.object({
    ...envelope,
    eventType: z.literal("ReviewRequested"),
    payload: z.object({
      subtasksComplete: z.boolean(),
      force: z.boolean().optional(),
    }),
  }),
  z.object({
    ...envelope,
    eventType: z.literal("ReviewRejected"),
    payload: z.object({ reviewRef: z.string() }),
  }),
  z.object({
    ...envelope,
    eventType: z.literal("Completed"),
    payload: z.object({ evidence: EvidenceSchema }),
  }),
  z.object({
    ...envelope,
    eventType: z.literal("Blocked"),
    payload: z.object({ blocker: z.string().optional() }),
  }),
  z.object({
    ...envelope,
    eventType: z.literal("Unblocked"),
    payload: z.object({ resolution: z.string().optional() }),
  }),
  z.object({
    ...envelope,
    eventType: z.literal("Canceled"),
    payload: z.object({ note: z.string().optional() }),
  }),
  z.object({
    ...envelope,
    eventType: z.literal("ForcedTransition"),
    payload: z.object({
      toLane: LaneSchema.exclude(["done"]),
      reviewRef: z.string().optional(),
      assignee: z.string().optional(),
    }),
  }),
  z.object({
    ...envelope,
    eventType: z.literal("ReconciliationApplied"),
    payload: z.object({
      toLane: LaneSchema,
      commits: z.array(CommitRefSchema),
      assignee: z.string().optional(),
      workspaceRef: z.string().optional(),
      subtasksComplete: z.boolean().optional(),
    }),
  }),
  z.object({
    ...envelope,
    eventType: z.literal("Annotated"),
    payload: z.object({ note: nonBlank }),
  }),
]);

/**
 * Full status event schema, including the cross-field rule that any
 * guard-bypassing event names a reason.
 */
export const StatusEventSchema = StatusEventUnion.superRefine((event, ctx) => {
  const needsReason =
    event.eventType === "ForcedTransition" ||
    (event.eventType === "ReviewRequested" && event.payload.force === true);
  if (needsReason && (event.reason === undefined || event.reason.trim() === "")) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["reason"],
      message: `${event.eventType} requires a non-empty reason`,
    });
  }
});

// =============================================================================
// Validation
// =============================================================================

export type EventValidation =
  | { readonly ok: true; readonly event: StatusEvent }
  | { readonly ok: false; readonly issues: readonly string[] };

/**
 * Validate an unknown value as a status event.
 *
 * Issues are rendered as `path: message`, one per failed rule.
 */
export function validateStatusEvent(value: unknown): EventValidation {
  const result = StatusEventSchema.safeParse(value);
  if (result.success) {
    return { ok: true, event: result.data };
  }
  return {
    ok: false,
    issues: result.error.issues.map((issue) => {
      const path = issue.path.join(".");
      return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
    }),
  };
}

/**
 * Validate an event bound for a log, optionally pinned to one feature.
 *
 * @throws SchemaError when the event is malformed or names another feature
 */
export function requireStatusEvent(value: unknown, feature?: string): StatusEvent {
  const result = validateStatusEvent(value);
  if (!result.ok) {
    throw new SchemaError(result.issues, feature);
  }
  const actual = result.event.aggregateId.feature;
  if (feature !== undefined && actual !== feature) {
    throw new SchemaError(
      [`event ${result.event.eventId} belongs to feature "${actual}"`],
      feature,
    );
  }
  return result.event;
}
