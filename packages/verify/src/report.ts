/**
 * @lanekeeper/verify — Validation report.
 *
 * CI gates on this: any guard violation, merge ambiguity or unreadable
 * log line fails the feature.
 */

import type { GuardViolation, MergeAmbiguity } from "@lanekeeper/types";
import type { ValidationInput, ValidationReport } from "./types.js";

export function buildValidationReport(input: ValidationInput): ValidationReport {
  const { feature, read, merged } = input;
  const passed =
    read.errors.length === 0 &&
    merged.violations.length === 0 &&
    merged.ambiguities.length === 0;

  return {
    feature,
    passed,
    schemaErrors: read.errors,
    violations: merged.violations,
    ambiguities: merged.ambiguities,
    superseded: merged.superseded,
    eventCount: merged.events.length,
  };
}

/** Process exit code for a report: 1 when it did not pass. */
export function reportExitCode(report: ValidationReport): 0 | 1 {
  return report.passed ? 0 : 1;
}

/**
 * One line naming the event, the attempted transition and the actor.
 *
 * @example
 * "01J... WP01 Completed planned -> done by agent-1: illegal transition planned -> done"
 */
export function describeViolation(v: GuardViolation): string {
  const target = v.targetLane ?? "?";
  return `${v.eventId} ${v.wp} ${v.attemptedEventType} ${v.currentLane} -> ${target} by ${v.actor}: ${v.reason}`;
}

/**
 * One line listing each contending event with its transition and actor.
 *
 * @example
 * "WP01 01J...3 ForcedTransition in_progress -> planned by lead; 01J...4 ForcedTransition in_progress -> blocked by lead-2: concurrent forced transitions ..."
 */
export function describeAmbiguity(a: MergeAmbiguity): string {
  const contenders = a.eventIds.map(
    (id, i) =>
      `${id} ${a.eventTypes[i] ?? "?"} ${a.fromLane} -> ${a.targetLanes[i] ?? "?"} by ${a.actors[i] ?? "?"}`,
  );
  return `${a.wp} ${contenders.join("; ")}: ${a.reason}`;
}
