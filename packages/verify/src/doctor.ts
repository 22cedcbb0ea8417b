/**
 * @lanekeeper/verify — Doctor.
 *
 * Read-only health checks. Findings recommend an action; nothing here
 * writes a file or appends an event.
 */

import type { StatusSnapshot } from "@lanekeeper/types";
import { computeSnapshotHash } from "@lanekeeper/event-store";
import type {
  DoctorFinding,
  DoctorInput,
  DoctorResult,
  StaleClaimOptions,
} from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Whole days between `from` and `now`, or undefined when `from` is unparseable. */
function ageInDays(from: string | undefined, now: Date): number | undefined {
  if (from === undefined) return undefined;
  const t = Date.parse(from);
  if (Number.isNaN(t)) return undefined;
  return Math.floor((now.getTime() - t) / DAY_MS);
}

// =============================================================================
// Checks
// =============================================================================

/**
 * Flag WPs that have sat in `claimed` or `in_progress` longer than the
 * thresholds allow.
 */
export function checkStaleClaims(
  snapshot: StatusSnapshot,
  options: StaleClaimOptions,
): DoctorFinding[] {
  const findings: DoctorFinding[] = [];

  for (const wp of Object.values(snapshot.workPackages)) {
    let threshold: number;
    let action: string;
    if (wp.lane === "claimed") {
      threshold = options.claimedDays;
      action = `Either begin work on ${wp.wp} (move to in_progress) or release the claim (move back to planned).`;
    } else if (wp.lane === "in_progress") {
      threshold = options.inProgressDays;
      action = `Check if ${wp.wp} is blocked (move to blocked with a reason) or finish it (move to for_review).`;
    } else {
      continue;
    }

    const age = ageInDays(wp.lastTransitionAt, options.now);
    if (age === undefined || age <= threshold) continue;

    findings.push({
      severity: "warning",
      category: "stale_claim",
      wp: wp.wp,
      message:
        `${wp.wp} has been in '${wp.lane}' for ${age} days ` +
        `(threshold: ${threshold} days). Actor: ${wp.claimant ?? wp.lastActor ?? "unknown"}`,
      recommendedAction: action,
    });
  }

  return findings;
}

/**
 * Compare the snapshot file against a fresh materialization.
 *
 * Drift is harmless (readers recompute) but means the file is stale.
 */
export function checkMaterializationDrift(
  snapshotOnDisk: StatusSnapshot | undefined,
  recomputed: StatusSnapshot,
): DoctorFinding[] {
  const action = "Re-materialize status.json from the canonical event log.";

  if (snapshotOnDisk === undefined) {
    return [
      {
        severity: "warning",
        category: "materialization_drift",
        message: "status.json is missing or unreadable",
        recommendedAction: action,
      },
    ];
  }

  const onDisk = computeSnapshotHash(snapshotOnDisk);
  const fresh = computeSnapshotHash(recomputed);
  if (onDisk === fresh) return [];

  return [
    {
      severity: "warning",
      category: "materialization_drift",
      message: `status.json differs from the event log (hash ${onDisk.slice(0, 12)} != ${fresh.slice(0, 12)})`,
      recommendedAction: action,
    },
  ];
}

// =============================================================================
// Runner
// =============================================================================

export function runDoctor(input: DoctorInput): DoctorResult {
  const findings: DoctorFinding[] = [];

  for (const err of input.schemaErrors ?? []) {
    findings.push({
      severity: "error",
      category: "schema_error",
      message: `line ${err.line}: ${err.message}`,
      recommendedAction: "Repair or remove the line; it is excluded from every replay.",
    });
  }

  findings.push(...checkStaleClaims(input.recomputed, input.stale));
  findings.push(...checkMaterializationDrift(input.snapshotOnDisk, input.recomputed));

  return {
    feature: input.feature,
    findings,
    healthy: findings.length === 0,
    hasErrors: findings.some((f) => f.severity === "error"),
  };
}
