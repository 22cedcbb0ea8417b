/**
 * @lanekeeper/runtime — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Storage
  STATUS_ROOT: z.string().min(1).default("kitty-specs"),

  // Lock file
  LOCK_STALE_MS: z.coerce.number().int().min(1).default(300000),
  LOCK_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(50),
  LOCK_MAX_RETRIES: z.coerce.number().int().min(0).default(100),

  // Doctor thresholds
  STALE_CLAIMED_DAYS: z.coerce.number().int().min(0).default(7),
  STALE_IN_PROGRESS_DAYS: z.coerce.number().int().min(0).default(14),

  // Default actor for emitted events
  ACTOR: z.string().trim().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  readonly code = "CONFIG_ERROR" as const;

  constructor(public readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws ConfigError if a variable is present but invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return result.data;
}
