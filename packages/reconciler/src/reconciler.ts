/**
 * Reconciler — scan, detect, emit.
 *
 * Usage:
 *   const result = reconcile(snapshot, scans, { dryRun: true });
 *   // inspect result.proposedEvents, then
 *   reconcile(snapshot, scans, { dryRun: false, log });
 *
 * Rules:
 * - Reconciliation only ever proposes ReconciliationApplied events
 * - Each step is validated against the state machine before it is kept
 * - A dry run writes nothing; apply goes through the log's normal append
 * - The materialized snapshot is never edited; it is recomputed by readers
 */

import type {
  CommitRef,
  Lane,
  ReconciliationAppliedPayload,
  StatusEvent,
  StatusSnapshot,
} from "@lanekeeper/types";
import { LamportClock, createStatusEvent } from "@lanekeeper/event-store";
import { validateTransition } from "@lanekeeper/lifecycle";
import { detectDrift, laneChain } from "./detect.js";
import { scanRepos } from "./scan.js";
import type {
  DriftPlan,
  ReconcileOptions,
  ReconcileResult,
  RepoScan,
  WpCommit,
} from "./types.js";
import { ReconcileError } from "./types.js";

export const RECONCILE_ACTOR = "reconcile";

function latestCommit(commits: readonly WpCommit[]): WpCommit | undefined {
  return [...commits].sort((a, b) =>
    a.date === b.date ? (a.sha < b.sha ? -1 : 1) : a.date < b.date ? -1 : 1,
  )[commits.length - 1];
}

function stepPayload(to: Lane, plan: DriftPlan): ReconciliationAppliedPayload {
  const commits: CommitRef[] = plan.commits.map((c) => ({
    repo: c.repo,
    sha: c.sha,
    branch: c.branch,
  }));
  const latest = latestCommit(plan.commits);

  switch (to) {
    case "claimed":
      return latest !== undefined && latest.author.trim().length > 0
        ? { toLane: to, commits, assignee: latest.author }
        : { toLane: to, commits };
    case "in_progress":
      return latest !== undefined
        ? { toLane: to, commits, workspaceRef: `${latest.repo}:${latest.branch}` }
        : { toLane: to, commits };
    case "for_review":
      return { toLane: to, commits, subtasksComplete: true };
    default:
      return { toLane: to, commits };
  }
}

interface EmitContext {
  readonly feature: string;
  readonly snapshot: StatusSnapshot;
  readonly clock: LamportClock;
  readonly now?: () => Date;
}

/** Build and validate the chain of events for one plan. */
function emitPlan(plan: DriftPlan, ctx: EmitContext, details: string[]): StatusEvent[] {
  const events: StatusEvent[] = [];
  let lane = plan.from;
  let claimant = ctx.snapshot.workPackages[plan.wp]?.claimant;

  for (const [from, to] of laneChain(plan.from, plan.to)) {
    const payload = stepPayload(to, plan);
    const event = createStatusEvent(
      {
        eventType: "ReconciliationApplied",
        aggregateId: { feature: ctx.feature, wp: plan.wp },
        fromLane: from,
        lamportClock: ctx.clock.tick(),
        actor: RECONCILE_ACTOR,
        reason: `Reconciliation: ${plan.summary}`,
        payload,
      },
      ctx.now !== undefined ? { now: ctx.now } : {},
    );

    const check = validateTransition(lane, event, claimant !== undefined ? { claimant } : {});
    if (!check.ok) {
      details.push(`${plan.wp}: skipping ${from} -> ${to}: ${check.violation.reason}`);
      break;
    }

    events.push(event);
    lane = check.lane;
    if (to === "claimed") claimant = payload.assignee ?? RECONCILE_ACTOR;
  }

  return events;
}

/** Highest clock in the plan, rejected and superseded events included. */
function highestClock(snapshot: StatusSnapshot): number {
  let max = 0;
  for (const wp of Object.values(snapshot.workPackages)) {
    if (wp.lamportClock > max) max = wp.lamportClock;
  }
  for (const entry of snapshot.audit) {
    if (entry.lamportClock > max) max = entry.lamportClock;
  }
  return max;
}

/**
 * Reconcile planned lanes with evidence from target repositories.
 *
 * @param plan - Current materialized snapshot (missing WPs count as planned)
 * @param scans - One scan per target repository
 * @throws ReconcileError LOG_REQUIRED when applying without a log
 */
export function reconcile(
  plan: StatusSnapshot,
  scans: readonly RepoScan[],
  options: ReconcileOptions = {},
): ReconcileResult {
  const dryRun = options.dryRun ?? true;
  if (!dryRun && options.log === undefined) {
    throw new ReconcileError("LOG_REQUIRED", "Applying reconciliation requires a status log");
  }

  const feature = plan.feature;
  const findings = scanRepos(feature, scans);
  const details: string[] = [];
  const proposed: StatusEvent[] = [];

  if (findings.commits.size === 0) {
    details.push("No WP-linked commits found in target repos");
  } else {
    const detection = detectDrift(plan, findings);
    details.push(...detection.details);

    const floor = Math.max(options.lamportFloor ?? 0, highestClock(plan));
    const ctx: EmitContext = {
      feature,
      snapshot: plan,
      clock: new LamportClock(floor),
      ...(options.now !== undefined ? { now: options.now } : {}),
    };
    for (const driftPlan of detection.plans) {
      proposed.push(...emitPlan(driftPlan, ctx, details));
    }
  }

  let applied = 0;
  if (!dryRun && options.log !== undefined) {
    for (const event of proposed) {
      options.log.append(event);
      applied += 1;
    }
  }

  return {
    feature,
    proposedEvents: proposed,
    driftDetected: proposed.length > 0,
    details,
    errors: findings.errors,
    reposScanned: findings.reposScanned,
    wpsAnalyzed: findings.commits.size,
    applied,
  };
}
