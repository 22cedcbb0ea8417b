/**
 * @lanekeeper/merge — Merge and materialize.
 *
 * materialize: dedupe → sort → precedence → reduce. Every reader of a log
 * goes through it, whether the log came from one branch or was produced by
 * a textual merge of several.
 *
 * mergeLogs(a, b) is materialize over the concatenation, so it is
 * symmetric and idempotent by construction.
 */

import type {
  GuardViolation,
  MergeAmbiguity,
  StatusEvent,
  StatusSnapshot,
  Supersession,
} from "@lanekeeper/types";
import { reduce } from "@lanekeeper/lifecycle";
import { canonicalOrder } from "./ordering.js";
import { resolveRollbackPrecedence } from "./precedence.js";

export interface MaterializeOptions {
  /** Feature name used when there are no events */
  readonly feature?: string;
}

export interface MergeResult {
  /** Deduplicated events in canonical order; the merged log */
  readonly events: readonly StatusEvent[];
  readonly snapshot: StatusSnapshot;
  readonly violations: readonly GuardViolation[];
  readonly superseded: readonly Supersession[];
  readonly ambiguities: readonly MergeAmbiguity[];
}

export function materialize(
  events: readonly StatusEvent[],
  options: MaterializeOptions = {},
): MergeResult {
  const ordered = canonicalOrder(events);
  const precedence = resolveRollbackPrecedence(ordered);
  const { snapshot, violations } = reduce(ordered, {
    superseded: precedence.superseded,
    ...(options.feature !== undefined ? { feature: options.feature } : {}),
  });

  return {
    events: ordered,
    snapshot,
    violations,
    superseded: snapshot.superseded,
    ambiguities: precedence.ambiguities,
  };
}

/**
 * Merge two divergent logs of the same feature.
 */
export function mergeLogs(
  logA: readonly StatusEvent[],
  logB: readonly StatusEvent[],
  options: MaterializeOptions = {},
): MergeResult {
  return materialize([...logA, ...logB], options);
}
