/**
 * Lane Types
 *
 * The seven lifecycle lanes a work package moves through.
 *
 * Rules:
 * - `done` and `canceled` are terminal (no outgoing transitions)
 * - Logs only ever store canonical lane names; aliases are resolved on input
 */

export type Lane =
  | "planned"
  | "claimed"
  | "in_progress"
  | "for_review"
  | "done"
  | "blocked"
  | "canceled";

/** All lanes in canonical order. */
export const LANES: readonly Lane[] = [
  "planned",
  "claimed",
  "in_progress",
  "for_review",
  "done",
  "blocked",
  "canceled",
];

export const TERMINAL_LANES: ReadonlySet<Lane> = new Set<Lane>(["done", "canceled"]);

const ALIASES = {
  doing: "in_progress",
} as const satisfies Record<string, Lane>;

/** A lane name callers may use in place of a canonical one. */
export type LaneAlias = keyof typeof ALIASES;

/** Accepted aliases for lane names supplied by callers. */
export const LANE_ALIASES: Readonly<Record<string, Lane>> = ALIASES;

/**
 * Position of each lane along the forward progression.
 *
 * `blocked` and `canceled` sit outside the progression and have no rank.
 */
export const LANE_PROGRESSION: readonly Lane[] = [
  "planned",
  "claimed",
  "in_progress",
  "for_review",
  "done",
];

export function isTerminalLane(lane: Lane): boolean {
  return TERMINAL_LANES.has(lane);
}

/**
 * Progression rank of a lane, or undefined for lanes outside the
 * forward progression (blocked, canceled).
 */
export function laneRank(lane: Lane): number | undefined {
  const index = LANE_PROGRESSION.indexOf(lane);
  return index >= 0 ? index : undefined;
}
