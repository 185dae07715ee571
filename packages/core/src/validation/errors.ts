/**
 * Common error types for the record core.
 * Every error carries a stable `code` so that the agent interface and the
 * CLI can report it without matching on class names.
 */

export type TaskdeckErrorCode =
  | "PARSE_ERROR"
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "LOCK_CONTENTION"
  | "IO_ERROR"
  | "SYNC_ERROR"
  | "SYNC_NETWORK_ERROR"
  | "SYNC_TIMEOUT"
  | "SYNC_CONFLICT"
  | "GIT_ERROR"
  | "CONFIG_ERROR";

/**
 * Base class for every error raised by the core.
 */
export class TaskdeckError extends Error {
  public readonly code: TaskdeckErrorCode;

  constructor(message: string, code: TaskdeckErrorCode) {
    super(message);
    this.name = "TaskdeckError";
    this.code = code;
    Object.setPrototypeOf(this, TaskdeckError.prototype);
  }
}

/**
 * Standard validation result interface for all validators.
 */
export interface ValidationResult {
  isValid: boolean;
  errors: ValidationIssue[];
}

export interface ValidationIssue {
  field: string;
  message: string;
  value: unknown;
}

/**
 * A record header that cannot be decoded. `field` names the offending key,
 * or the delimiter when the header block itself is malformed.
 */
export class ParseError extends TaskdeckError {
  public readonly field: string;
  public readonly source?: string | undefined;

  constructor(field: string, message: string, source?: string) {
    super(`${source ? `${source}: ` : ""}invalid ${field}: ${message}`, "PARSE_ERROR");
    this.name = "ParseError";
    this.field = field;
    this.source = source;
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}

/**
 * Thrown when a create or patch would produce an invalid record.
 * Nothing is written when this is raised.
 */
export class ValidationError extends TaskdeckError {
  public readonly errors: ValidationIssue[];

  constructor(errors: ValidationIssue[]) {
    const summary = errors.map((e) => `${e.field}: ${e.message}`).join("; ");
    super(`Validation failed: ${summary}`, "VALIDATION_ERROR");
    this.name = "ValidationError";
    this.errors = errors;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  static forField(field: string, message: string, value: unknown): ValidationError {
    return new ValidationError([{ field, message, value }]);
  }
}

/**
 * Error for when a record is not found during operations.
 */
export class RecordNotFoundError extends TaskdeckError {
  public readonly recordId: string;

  constructor(recordId: string) {
    super(`Record with id ${recordId} not found`, "NOT_FOUND");
    this.name = "RecordNotFoundError";
    this.recordId = recordId;
    Object.setPrototypeOf(this, RecordNotFoundError.prototype);
  }
}

export function isTaskdeckError(error: unknown): error is TaskdeckError {
  return error instanceof TaskdeckError;
}
