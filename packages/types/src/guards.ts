/**
 * Runtime Type Guards
 *
 * Narrowing functions for status domain types.
 * These enable safe runtime validation at system boundaries
 * (snapshot files, caller input, scan results).
 */

import type { Lane } from "./lane.js";
import { LANES, LANE_ALIASES } from "./lane.js";
import type { AggregateId, StatusEventType } from "./event.js";
import type { ReviewRecord } from "./evidence.js";
import type { GuardViolation, StatusSnapshot } from "./status.js";

// =============================================================================
// Lane guards
// =============================================================================

const LANE_SET = new Set<string>(LANES);

export function isLane(value: unknown): value is Lane {
  return typeof value === "string" && LANE_SET.has(value);
}

/**
 * Resolve a caller-supplied lane name (case-insensitive, aliases allowed)
 * to a canonical lane. Returns undefined for unknown names.
 */
export function resolveLaneAlias(value: string): Lane | undefined {
  const normalized = value.trim().toLowerCase();
  const aliased = LANE_ALIASES[normalized] ?? normalized;
  return isLane(aliased) ? aliased : undefined;
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_TYPES = new Set<string>([
  "Claimed",
  "StateEntered",
  "ReviewRequested",
  "ReviewRejected",
  "Completed",
  "Blocked",
  "Unblocked",
  "Canceled",
  "ForcedTransition",
  "ReconciliationApplied",
  "Annotated",
]);

export function isStatusEventType(value: unknown): value is StatusEventType {
  return typeof value === "string" && EVENT_TYPES.has(value);
}

export function isAggregateId(value: unknown): value is AggregateId {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.feature === "string" &&
    v.feature.length > 0 &&
    typeof v.wp === "string" &&
    v.wp.length > 0
  );
}

// =============================================================================
// Evidence guards
// =============================================================================

/** True when the review names a reviewer and approves the work. */
export function isApprovedReview(value: unknown): value is ReviewRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.reviewer === "string" &&
    v.reviewer.trim().length > 0 &&
    v.verdict === "approved" &&
    typeof v.reference === "string"
  );
}

// =============================================================================
// Status guards
// =============================================================================

export function isGuardViolation(value: unknown): value is GuardViolation {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.wp === "string" &&
    typeof v.actor === "string" &&
    isLane(v.currentLane) &&
    isStatusEventType(v.attemptedEventType) &&
    typeof v.reason === "string"
  );
}

/**
 * Shallow structural check for a snapshot read back from disk.
 */
export function isStatusSnapshot(value: unknown): value is StatusSnapshot {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.feature === "string" &&
    typeof v.eventCount === "number" &&
    Number.isInteger(v.eventCount) &&
    (v.lastEventId === null || typeof v.lastEventId === "string") &&
    v.workPackages !== null &&
    typeof v.workPackages === "object" &&
    v.summary !== null &&
    typeof v.summary === "object" &&
    Array.isArray(v.audit) &&
    Array.isArray(v.violations) &&
    Array.isArray(v.superseded)
  );
}
