/**
 * @lanekeeper/reconciler
 *
 * Aligns planned WP lanes with implementation evidence found in target
 * repositories, by proposing (or appending) ReconciliationApplied events.
 */

export type {
  CommitInfo,
  BranchScan,
  CommitScan,
  RepoScan,
  WpCommit,
  ScanFindings,
  DriftPlan,
  ReconcileOptions,
  ReconcileResult,
  ReconcileErrorCode,
} from "./types.js";
export { ReconcileError } from "./types.js";

export { WP_PATTERN, extractWpIds, scanRepos } from "./scan.js";
export type { DriftDetection } from "./detect.js";
export { laneChain, currentLane, detectDrift } from "./detect.js";
export { reconcile, RECONCILE_ACTOR } from "./reconciler.js";
