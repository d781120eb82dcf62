/**
 * Centralized Configuration Module
 *
 * Type-safe, validated access to the environment variables the repair
 * engine reads. Parsed lazily so tests can stub the environment first.
 */

import { z } from "zod";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    return true;
  });

const Environment = z.enum(["development", "test", "production"]);

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

const ConfigSchema = z.object({
  server: z.object({
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
  }),

  scenes: z.object({
    // Path of the scene configuration file the CLI repairs by default
    configPath: z.string().min(1).default("scenes.yaml"),
  }),

  repair: z.object({
    maxIdAttempts: z.coerce.number().int().positive().default(1000),
    backupMaxAttempts: z.coerce.number().int().positive().default(1000),
    // Compare the reloaded document with the repaired one, not just parse it
    verifyContent: booleanString.default(true),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
    },
    scenes: {
      configPath: env.SCENES_CONFIG_PATH || undefined,
    },
    repair: {
      maxIdAttempts: env.REPAIR_MAX_ID_ATTEMPTS,
      backupMaxAttempts: env.BACKUP_MAX_ATTEMPTS,
      verifyContent: env.REPAIR_VERIFY_CONTENT,
    },
  };

  try {
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error("❌ Configuration validation failed:");
      console.error(JSON.stringify(error.issues, null, 2));
      throw new Error("Invalid configuration. Please check environment variables.");
    }
    throw error;
  }
}

/**
 * Lazily parsed configuration, cached after the first call.
 */
let _cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}
