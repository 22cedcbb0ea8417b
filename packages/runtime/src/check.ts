/**
 * @lanekeeper/runtime — CI check.
 *
 * Validates each feature's log and prints one report per feature. The
 * exit code is 1 when any feature fails.
 */

import { reportExitCode } from "@lanekeeper/verify";
import type { StatusService } from "./status-service.js";
import { formatValidationReport } from "./report.js";

export interface CheckOptions {
  readonly service: StatusService;
  /** Features to check; every feature with a log when empty */
  readonly features?: readonly string[];
  readonly write: (text: string) => void;
}

export function runCheck(options: CheckOptions): 0 | 1 {
  const features =
    options.features !== undefined && options.features.length > 0
      ? options.features
      : options.service.listFeatures();

  let exitCode: 0 | 1 = 0;
  for (const feature of features) {
    const report = options.service.validate(feature);
    options.write(formatValidationReport(report));
    if (reportExitCode(report) === 1) exitCode = 1;
  }
  return exitCode;
}
