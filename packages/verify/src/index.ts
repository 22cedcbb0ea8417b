/**
 * @lanekeeper/verify — Validation and health checks for status logs.
 *
 * Core exports:
 * - buildValidationReport / reportExitCode — CI gate
 * - describeViolation — one-line violation rendering
 * - runDoctor — stale claims and materialization drift
 */

export type {
  ValidationInput,
  ValidationReport,
  Severity,
  FindingCategory,
  DoctorFinding,
  StaleClaimOptions,
  DoctorInput,
  DoctorResult,
} from "./types.js";

export {
  buildValidationReport,
  reportExitCode,
  describeViolation,
  describeAmbiguity,
} from "./report.js";

export { checkStaleClaims, checkMaterializationDrift, runDoctor } from "./doctor.js";
