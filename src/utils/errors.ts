/**
 * Error taxonomy for the scene repair engine.
 *
 * Every failure the engine raises is a SceneRepairError carrying a stable
 * code, the file path involved and the underlying cause.
 */

import { ZodError } from "zod";

/**
 * Error codes for structured error payloads
 */
export type ErrorCode =
  | "NOT_FOUND"
  | "PARSE_ERROR"
  | "IO_ERROR"
  | "VERIFICATION_FAILED"
  | "ROLLBACK_FAILED"
  | "REPAIR_FAILED"
  | "CANCELLED"
  | "INTERNAL";

export class SceneRepairError extends Error {
  readonly name: string = "SceneRepairError";

  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly path?: string,
    public readonly cause?: unknown
  ) {
    super(message);
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** The configuration file does not exist. Not retried. */
export class NotFoundError extends SceneRepairError {
  readonly name = "NotFoundError";

  constructor(path: string, cause?: unknown) {
    super(`Scene configuration not found: ${path}`, "NOT_FOUND", path, cause);
  }
}

/** The document is not well-formed YAML or does not match the scene schema. */
export class ParseError extends SceneRepairError {
  readonly name = "ParseError";

  constructor(message: string, path?: string, cause?: unknown) {
    super(message, "PARSE_ERROR", path, cause);
  }
}

/** Read, write, copy or rename failure (permissions, disk full, missing backup). */
export class IOError extends SceneRepairError {
  readonly name = "IOError";

  constructor(message: string, path?: string, cause?: unknown) {
    super(message, "IO_ERROR", path, cause);
  }
}

/**
 * The file written by a repair could not be reloaded, or reloaded into
 * something other than the repaired document. Raised after a successful
 * rollback.
 */
export class VerificationError extends SceneRepairError {
  readonly name = "VerificationError";

  constructor(message: string, path: string, cause?: unknown) {
    super(message, "VERIFICATION_FAILED", path, cause);
  }
}

/**
 * Restoring the backup failed. The original file may be partially written;
 * `backupPath` is the only recovery artifact.
 */
export class RollbackFailure extends SceneRepairError {
  readonly name = "RollbackFailure";

  constructor(
    path: string,
    public readonly backupPath: string,
    public readonly triggeredBy: SceneRepairError,
    cause?: unknown
  ) {
    super(
      `Rollback of ${path} from ${backupPath} failed after: ${triggeredBy.message}`,
      "ROLLBACK_FAILED",
      path,
      cause
    );
  }
}

/** A repair transform could not produce a valid document. */
export class RepairError extends SceneRepairError {
  readonly name = "RepairError";

  constructor(message: string, path?: string, cause?: unknown) {
    super(message, "REPAIR_FAILED", path, cause);
  }
}

/** The caller aborted the repair before the file was written. */
export class RepairCancelledError extends SceneRepairError {
  readonly name = "RepairCancelledError";

  constructor(path: string, stage: string) {
    super(`Repair of ${path} cancelled before ${stage}`, "CANCELLED", path);
  }
}

/**
 * Node system errors expose `code` (ENOENT, EACCES, ...)
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Structured error payload (error.v1 schema)
 */
export interface ErrorV1 {
  schema: "error.v1";
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): ErrorV1 {
  const error: ErrorV1 = {
    schema: "error.v1",
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  return error;
}

/**
 * Convert any error to ErrorV1 for operator output (never includes stacks)
 */
export function toErrorV1(error: unknown): ErrorV1 {
  if (error instanceof RollbackFailure) {
    return buildErrorV1(error.code, error.message, {
      path: error.path,
      backup_path: error.backupPath,
      triggered_by: error.triggeredBy.code,
      cause: error.cause === undefined ? undefined : describeCause(error.cause),
    });
  }

  if (error instanceof SceneRepairError) {
    const details: Record<string, unknown> = {};
    if (error.path) details.path = error.path;
    if (error.cause !== undefined) {
      details.cause =
        error.cause instanceof ZodError ? error.cause.flatten() : describeCause(error.cause);
    }
    return buildErrorV1(error.code, error.message, details);
  }

  if (error instanceof ZodError) {
    return buildErrorV1("PARSE_ERROR", "Validation failed", {
      validation_errors: error.flatten(),
    });
  }

  if (error instanceof Error) {
    return buildErrorV1("INTERNAL", error.message || "An unexpected error occurred");
  }

  if (typeof error === "string") {
    return buildErrorV1("INTERNAL", error);
  }

  return buildErrorV1("INTERNAL", "An unexpected error occurred");
}
