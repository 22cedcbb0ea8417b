/**
 * @lanekeeper/lifecycle
 *
 * Work package lifecycle: the 7-lane state machine and the reducer that
 * replays status events into a snapshot.
 */

export type { TransitionContext, TransitionResult } from "./transitions.js";
export {
  VALID_TRANSITIONS,
  isValidTransition,
  targetLaneOf,
  isForcedEvent,
  validateTransition,
} from "./transitions.js";

export type { ReduceOptions, ReduceResult } from "./reducer.js";
export { reduce, emptySummary } from "./reducer.js";
