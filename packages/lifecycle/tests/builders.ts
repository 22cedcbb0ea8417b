/**
 * Event builders for the lifecycle and merge tests.
 *
 * `n` doubles as the Lamport clock and the ID suffix, so events built with
 * increasing `n` are already in canonical order.
 */

import type { Lane, ReviewRecord, StatusEvent } from "@lanekeeper/types";

export const FEATURE = "034-parallel";

export interface EnvelopeOptions {
  readonly wp?: string;
  readonly actor?: string;
  readonly fromLane?: Lane;
  readonly reason?: string;
  readonly clock?: number;
}

export function eventId(n: number): string {
  return `01J${String(n).padStart(23, "0")}`;
}

function envelope(n: number, fromLane: Lane, opts: EnvelopeOptions) {
  return {
    eventId: eventId(n),
    aggregateId: { feature: FEATURE, wp: opts.wp ?? "WP01" },
    fromLane: opts.fromLane ?? fromLane,
    lamportClock: opts.clock ?? n,
    at: new Date(Date.UTC(2026, 0, 5, 10, 0, n)).toISOString(),
    actor: opts.actor ?? "agent-1",
    ...(opts.reason !== undefined ? { reason: opts.reason } : {}),
  };
}

export const APPROVED: ReviewRecord = {
  reviewer: "reviewer-1",
  verdict: "approved",
  reference: "PR#7",
};

export function claim(n: number, assignee = "agent-1", opts: EnvelopeOptions = {}): StatusEvent {
  return { ...envelope(n, "planned", opts), eventType: "Claimed", payload: { assignee } };
}

/** Pass `null` for a start without a workspace reference. */
export function start(n: number, workspaceRef: string | null = "wt/WP01", opts: EnvelopeOptions = {}): StatusEvent {
  return {
    ...envelope(n, "claimed", opts),
    eventType: "StateEntered",
    payload: workspaceRef === null ? { lane: "in_progress" } : { lane: "in_progress", workspaceRef },
  };
}

export function replan(n: number, opts: EnvelopeOptions = {}): StatusEvent {
  return { ...envelope(n, "in_progress", opts), eventType: "StateEntered", payload: { lane: "planned" } };
}

export function requestReview(
  n: number,
  subtasksComplete = true,
  opts: EnvelopeOptions & { readonly force?: boolean } = {},
): StatusEvent {
  return {
    ...envelope(n, "in_progress", opts),
    eventType: "ReviewRequested",
    payload: opts.force === undefined ? { subtasksComplete } : { subtasksComplete, force: opts.force },
  };
}

export function rejectReview(n: number, reviewRef: string, opts: EnvelopeOptions = {}): StatusEvent {
  return {
    ...envelope(n, "for_review", { actor: "reviewer-1", ...opts }),
    eventType: "ReviewRejected",
    payload: { reviewRef },
  };
}

/** Pass `null` for evidence without a review. */
export function complete(n: number, review: ReviewRecord | null = APPROVED, opts: EnvelopeOptions = {}): StatusEvent {
  return {
    ...envelope(n, "for_review", { actor: "reviewer-1", ...opts }),
    eventType: "Completed",
    payload: {
      evidence: {
        repos: [{ repo: "app", branch: "034-parallel-WP01", commit: "abc1234", filesTouched: [] }],
        verification: [{ command: "npm test", result: "pass", summary: "all green" }],
        ...(review !== null ? { review } : {}),
      },
    },
  };
}

export function block(n: number, opts: EnvelopeOptions = {}): StatusEvent {
  return { ...envelope(n, "in_progress", opts), eventType: "Blocked", payload: { blocker: "waiting on API" } };
}

export function unblock(n: number, opts: EnvelopeOptions = {}): StatusEvent {
  return { ...envelope(n, "blocked", opts), eventType: "Unblocked", payload: {} };
}

export function cancel(n: number, opts: EnvelopeOptions = {}): StatusEvent {
  return { ...envelope(n, "planned", opts), eventType: "Canceled", payload: {} };
}

export function force(
  n: number,
  toLane: Exclude<Lane, "done">,
  opts: EnvelopeOptions & { readonly reviewRef?: string; readonly assignee?: string } = {},
): StatusEvent {
  return {
    ...envelope(n, "in_progress", { actor: "lead", reason: "manual override", ...opts }),
    eventType: "ForcedTransition",
    payload: {
      toLane,
      ...(opts.reviewRef !== undefined ? { reviewRef: opts.reviewRef } : {}),
      ...(opts.assignee !== undefined ? { assignee: opts.assignee } : {}),
    },
  };
}

export function reconcileTo(
  n: number,
  toLane: Lane,
  payload: { readonly assignee?: string; readonly workspaceRef?: string; readonly subtasksComplete?: boolean } = {},
  opts: EnvelopeOptions = {},
): StatusEvent {
  return {
    ...envelope(n, "planned", { actor: "reconcile", ...opts }),
    eventType: "ReconciliationApplied",
    payload: { toLane, commits: [{ repo: "app", sha: "abc1234", branch: "034-parallel-WP01" }], ...payload },
  };
}

export function annotate(n: number, note = "checkpoint", opts: EnvelopeOptions = {}): StatusEvent {
  return { ...envelope(n, "planned", opts), eventType: "Annotated", payload: { note } };
}

/** planned → claimed → in_progress → for_review, clocks n..n+2 */
export function toReview(n: number, opts: EnvelopeOptions = {}): StatusEvent[] {
  return [claim(n, opts.actor ?? "agent-1", opts), start(n + 1, "wt/WP01", opts), requestReview(n + 2, true, opts)];
}
