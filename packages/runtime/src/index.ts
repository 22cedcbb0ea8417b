/**
 * @lanekeeper/runtime — Configuration, logging and the status service.
 */

export { ConfigSchema, ConfigError, loadConfig } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { TransitionError } from "./errors.js";
export type { TransitionErrorCode } from "./errors.js";
export { StatusService, serviceOptionsFromConfig } from "./status-service.js";
export type { StatusServiceOptions, EmitRequest, EmitResult } from "./status-service.js";
export { formatValidationReport, formatDoctorResult } from "./report.js";
export { runCheck } from "./check.js";
export type { CheckOptions } from "./check.js";
