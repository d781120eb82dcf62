import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret redaction
 *
 * Redaction paths centralized in src/utils/logger-config.ts.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

/**
 * Logger surface the repair components depend on.
 * `log` (and any child of it) satisfies it; tests pass a recording fake.
 */
export interface Logger {
  debug(obj: Record<string, unknown>, msg?: string): void;
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
}

/**
 * Test sink for capturing telemetry events in tests.
 * Only usable when NODE_ENV=test or VITEST is set.
 */
let testSink: ((eventName: string, data: TelemetryShape) => void) | null = null;

export function setTestSink(sink: ((eventName: string, data: TelemetryShape) => void) | null): void {
  // Direct env check: config imports would create a cycle during module init
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * DO NOT modify these names without updating dashboards
 */
export const TelemetryEvents = {
  // Detection
  IssuesDetected: "scene.issues.detected",

  // Repair lifecycle
  RepairStarted: "scene.repair.started",
  RepairNoop: "scene.repair.noop",
  RepairCommitted: "scene.repair.committed",
  RepairRolledBack: "scene.repair.rolled_back",
  RepairFailed: "scene.repair.failed",
  RepairCancelled: "scene.repair.cancelled",

  // Backups
  BackupCreated: "scene.backup.created",
  BackupRestored: "scene.backup.restored",

  // Host notification
  ReloadNotifyFailed: "scene.reload.notify_failed",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * Datadog StatsD client (optional)
 * Only initialized when DD_AGENT_HOST or DD_API_KEY is set.
 */
let datadogClient: StatsD | null = null;

if (env.DD_AGENT_HOST || env.DD_API_KEY) {
  datadogClient = new StatsD({
    host: env.DD_AGENT_HOST || "127.0.0.1",
    port: Number(env.DD_AGENT_PORT) || 8125,
    prefix: "scene_repair.",
    globalTags: {
      service: env.DD_SERVICE || "scene-config-repair",
      env: env.DD_ENV || env.NODE_ENV || "development",
    },
    errorHandler: (error: Error) => {
      log.error({ error }, "Datadog StatsD error");
    },
  });
  log.info({ dd_host: env.DD_AGENT_HOST }, "Datadog StatsD client initialized");
}

export type TelemetryLeaf = string | number | boolean | null | undefined;
export type TelemetryShape = {
  [key: string]: TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
};
export type Event = Record<string, unknown>;

type TelemetryValue = TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;

function sanitizeTelemetryValue(value: unknown): TelemetryValue {
  if (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }

  if (Array.isArray(value)) {
    const sanitizedArray: Array<TelemetryLeaf | TelemetryShape> = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      if (sanitizedItem !== undefined && !Array.isArray(sanitizedItem)) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (typeof value === "object") {
    return sanitizeTelemetryData(Object.fromEntries(Object.entries(value)));
  }

  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

function tag(value: TelemetryValue): string {
  return typeof value === "string" && value.length > 0 ? value : "unknown";
}

/**
 * Emit a telemetry event: test sink, pino, then StatsD when configured.
 */
export function emit(event: TelemetryEventName, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  log.info({ event, ...eventData });

  if (!datadogClient) {
    return;
  }

  try {
    switch (event) {
      case TelemetryEvents.IssuesDetected: {
        if (typeof eventData.count === "number") {
          datadogClient.gauge("issues.count", eventData.count, {
            defect_class: tag(eventData.defect_class),
          });
        }
        break;
      }

      case TelemetryEvents.RepairNoop:
      case TelemetryEvents.RepairCommitted:
      case TelemetryEvents.RepairRolledBack:
      case TelemetryEvents.RepairFailed:
      case TelemetryEvents.RepairCancelled: {
        datadogClient.increment("repair.outcome", 1, {
          outcome: event.split(".").pop() ?? "unknown",
          defect_class: tag(eventData.defect_class),
        });
        if (typeof eventData.duration_ms === "number") {
          datadogClient.histogram("repair.duration_ms", eventData.duration_ms, {
            defect_class: tag(eventData.defect_class),
          });
        }
        break;
      }

      case TelemetryEvents.BackupCreated:
        datadogClient.increment("backup.created", 1);
        break;

      case TelemetryEvents.BackupRestored:
        datadogClient.increment("backup.restored", 1);
        break;

      case TelemetryEvents.ReloadNotifyFailed:
        datadogClient.increment("reload.notify_failed", 1);
        break;

      default:
        break;
    }
  } catch (error) {
    log.warn({ error, event }, "Failed to send StatsD metric");
  }
}
