/**
 * Error taxonomy shared by the render core, storage backends and the API.
 *
 * Validation failures and compile diagnostics are returned as data by the
 * render path. The classes below that are thrown are the ones a caller
 * cannot fix by editing its input: pipeline failures (AdapterError,
 * EncodeError) and collaborator failures (NotFoundError, StorageError).
 */

export type ErrorCode =
  | "VALIDATION"
  | "SCHEMA_DEFINITION"
  | "ADAPTER"
  | "ENCODE"
  | "NOT_FOUND"
  | "CONFLICT"
  | "STORAGE";

export class PressroomError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// ── Input ───────────────────────────────────────────────────────────

export type ValidationReason = "missing" | "type_mismatch" | "unknown_field";

export class ValidationError extends PressroomError {
  /** Dotted/indexed path of the offending field; "" is the root value. */
  readonly path: string;
  readonly reason: ValidationReason;
  readonly expected: string;
  readonly actual: string;

  constructor(path: string, reason: ValidationReason, expected: string, actual: string) {
    super("VALIDATION", describeViolation(path, reason, expected, actual));
    this.path = path;
    this.reason = reason;
    this.expected = expected;
    this.actual = actual;
  }
}

function describeViolation(
  path: string,
  reason: ValidationReason,
  expected: string,
  actual: string,
): string {
  const where = path === "" ? "root value" : `field "${path}"`;
  switch (reason) {
    case "missing":
      return `Missing required ${where} (expected ${expected})`;
    case "type_mismatch":
      return `Invalid ${where}: expected ${expected}, got ${actual}`;
    case "unknown_field":
      return `Unknown ${where} is not declared in the schema`;
  }
}

export class SchemaDefinitionError extends PressroomError {
  constructor(message: string) {
    super("SCHEMA_DEFINITION", message);
  }
}

// ── Render pipeline ─────────────────────────────────────────────────

/** Base for failures of the pipeline itself, as opposed to document errors. */
export class RenderPipelineError extends PressroomError {}

export class AdapterError extends RenderPipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ADAPTER", message, options);
  }
}

export class EncodeError extends RenderPipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ENCODE", message, options);
  }
}

// ── Storage ─────────────────────────────────────────────────────────

export class NotFoundError extends PressroomError {
  constructor(what: string) {
    super("NOT_FOUND", `${what} not found`);
  }
}

export class ConflictError extends PressroomError {
  constructor(message: string) {
    super("CONFLICT", message);
  }
}

export class StorageError extends PressroomError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORAGE", message, options);
  }
}

/** Message of any thrown value, for wrapping and logging. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
