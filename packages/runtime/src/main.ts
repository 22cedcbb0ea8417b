/**
 * @lanekeeper/runtime — CI entry point.
 *
 * Usage: main.ts [feature ...]
 *
 * Exits non-zero when any checked feature has guard violations, merge
 * ambiguities or unreadable log lines.
 */

import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { StatusService, serviceOptionsFromConfig } from "./status-service.js";
import { runCheck } from "./check.js";

function main(argv: readonly string[]): 0 | 1 {
  const config = loadConfig();
  const logger = createLogger(config);
  const service = new StatusService(serviceOptionsFromConfig(config, logger));

  logger.debug({ root: config.STATUS_ROOT, features: argv }, "Checking status logs");
  return runCheck({
    service,
    features: argv,
    // eslint-disable-next-line no-console
    write: (text) => console.log(text),
  });
}

try {
  process.exitCode = main(process.argv.slice(2));
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal error:", err);
  process.exitCode = 1;
}
