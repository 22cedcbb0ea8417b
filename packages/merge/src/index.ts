/**
 * @lanekeeper/merge
 *
 * Deterministic, rollback-aware merge of status event logs.
 */

export { compareEvents, dedupeEvents, sortEvents, canonicalOrder } from "./ordering.js";

export type { PrecedenceResult } from "./precedence.js";
export { resolveRollbackPrecedence } from "./precedence.js";

export type { MaterializeOptions, MergeResult } from "./merge.js";
export { materialize, mergeLogs } from "./merge.js";
