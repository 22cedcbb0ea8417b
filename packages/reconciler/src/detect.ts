/**
 * Detect — compare scan findings against the planned lanes.
 *
 * Evidence only ever moves a WP forward along
 * planned → claimed → in_progress → for_review. Reconciliation never
 * proposes `done` (that needs a reviewer), never touches terminal WPs,
 * and leaves blocked WPs to a human.
 */

import type { Lane, StatusSnapshot } from "@lanekeeper/types";
import { LANE_PROGRESSION, isTerminalLane } from "@lanekeeper/types";
import { isValidTransition } from "@lanekeeper/lifecycle";
import type { DriftPlan, ScanFindings } from "./types.js";

/**
 * Legal single-step chain from `from` to `to` along the forward
 * progression. Empty when `to` is not ahead of `from` or a step is not in
 * the transition table.
 */
export function laneChain(from: Lane, to: Lane): [Lane, Lane][] {
  const start = LANE_PROGRESSION.indexOf(from);
  const end = LANE_PROGRESSION.indexOf(to);
  if (start < 0 || end < 0 || end <= start) return [];

  const chain: [Lane, Lane][] = [];
  for (let i = start; i < end; i++) {
    const a = LANE_PROGRESSION[i];
    const b = LANE_PROGRESSION[i + 1];
    if (a === undefined || b === undefined || !isValidTransition(a, b)) return [];
    chain.push([a, b]);
  }
  return chain;
}

export function currentLane(snapshot: StatusSnapshot, wp: string): Lane {
  return snapshot.workPackages[wp]?.lane ?? "planned";
}

export interface DriftDetection {
  readonly plans: readonly DriftPlan[];
  readonly details: readonly string[];
}

export function detectDrift(snapshot: StatusSnapshot, findings: ScanFindings): DriftDetection {
  const plans: DriftPlan[] = [];
  const details: string[] = [];

  for (const wp of [...findings.commits.keys()].sort()) {
    const commits = findings.commits.get(wp) ?? [];
    const lane = currentLane(snapshot, wp);
    const merged = findings.merged.has(wp);
    const n = commits.length;

    if (isTerminalLane(lane)) {
      details.push(`${wp}: in terminal lane ${lane}, skipping`);
      continue;
    }
    if (lane === "blocked") {
      details.push(`${wp}: currently blocked, has ${n} commit(s); manual review needed`);
      continue;
    }

    let target: Lane;
    let summary: string;
    if (merged && lane === "for_review") {
      details.push(
        `${wp}: branch merged and in for_review; may be ready for done (requires reviewer approval)`,
      );
      continue;
    } else if (merged) {
      target = "for_review";
      summary = `branch merged with ${n} commit(s)`;
    } else if (n > 0 && lane === "planned") {
      target = "claimed";
      summary = `${n} commit(s) found`;
    } else if (n > 0 && lane === "claimed") {
      target = "in_progress";
      summary = `${n} commit(s) found`;
    } else {
      continue;
    }

    if (laneChain(lane, target).length === 0) {
      details.push(`${wp}: cannot build a legal transition chain from ${lane} to ${target}`);
      continue;
    }

    details.push(`${wp}: ${lane} -> ${target} (${summary})`);
    plans.push({ wp, from: lane, to: target, summary, commits });
  }

  return { plans, details };
}
