/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger options used by
 * src/utils/telemetry.ts and the repair CLI.
 *
 * Scene files can carry tokens in entity attributes (camera URLs,
 * webhook ids), so those are redacted wherever a record is logged.
 */

import type { LoggerOptions } from "pino";

/**
 * Paths to redact from all log output.
 * Uses Pino's path syntax with wildcards.
 */
export const REDACT_PATHS = [
  // Secrets one level below the log object
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.api_key",
  "*.access_token",
  "*.webhook_id",

  // StatsD
  "*.dd_api_key",
] as const;

/**
 * Redaction censor string
 */
export const REDACT_CENSOR = "[REDACTED]";

export function createRedactConfig(): { paths: string[]; censor: string } {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string): LoggerOptions {
  return {
    level,
    base: { service: "scene-config-repair" },
    redact: createRedactConfig(),
  };
}
