/**
 * Custom error classes for structured error handling.
 *
 * Usage:
 *   throw new NotFoundError("Contract file not found: ./contract.txt")
 *   throw new ValidationError("Invalid input", [{ field: "text", message: "Required" }])
 *   throw new AuditLogCorruptError("audit_log.json", "Unexpected token")
 *
 * At the CLI boundary:
 *   if (!result.ok) {
 *     console.error(JSON.stringify(result.error.toJSON()))
 *     process.exitCode = result.error.exitCode
 *   }
 */

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "INTERNAL_ERROR"
  // Persistence and report rendering
  | "AUDIT_LOG_CORRUPT"
  | "AUDIT_LOG_IO_FAILED"
  | "REPORT_FAILED"

export interface ErrorDetail {
  field?: string
  message: string
  code?: string
}

export interface SerializedError {
  code: ErrorCode
  message: string
  details?: ErrorDetail[]
}

/**
 * Base application error class.
 * All custom errors extend this for consistent handling.
 */
export class AppError extends Error {
  public readonly isOperational = true

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly exitCode: number = 1,
    public readonly details?: ErrorDetail[]
  ) {
    super(message)
    this.name = this.constructor.name
    Object.setPrototypeOf(this, new.target.prototype)
    Error.captureStackTrace(this, this.constructor)
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    }
  }
}

/**
 * Input or configuration failed validation
 */
export class ValidationError extends AppError {
  constructor(message = "Validation failed", details?: ErrorDetail[]) {
    super("VALIDATION_ERROR", message, 2, details)
  }

  static fromZodError(error: { issues: Array<{ path: PropertyKey[]; message: string }> }): ValidationError {
    const details = error.issues.map((e) => ({
      field: e.path.map(String).join("."),
      message: e.message,
    }))
    return new ValidationError("Validation failed", details)
  }
}

/**
 * A file or sample the caller asked for doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super("NOT_FOUND", message, 2)
  }
}

/**
 * Unexpected failure
 */
export class InternalError extends AppError {
  constructor(message = "An unexpected error occurred") {
    super("INTERNAL_ERROR", message, 1)
  }
}

/**
 * The persisted audit log exists but is not a valid entry array.
 * History is never discarded to recover from this.
 */
export class AuditLogCorruptError extends AppError {
  constructor(
    public readonly path: string,
    reason: string,
    details?: ErrorDetail[]
  ) {
    super("AUDIT_LOG_CORRUPT", `Audit log at ${path} is corrupt: ${reason}`, 1, details)
  }
}

/**
 * Reading or writing the audit log file failed at the I/O level
 */
export class AuditLogIoError extends AppError {
  constructor(
    public readonly path: string,
    reason: string
  ) {
    super("AUDIT_LOG_IO_FAILED", `Audit log I/O failed at ${path}: ${reason}`, 1)
  }
}

/**
 * PDF report could not be produced; no partial report is offered
 */
export class ReportGenerationError extends AppError {
  constructor(message = "Report generation failed") {
    super("REPORT_FAILED", message, 1)
  }
}

/**
 * Type guard to check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

/**
 * Convert any error to an AppError for consistent handling.
 * Preserves AppErrors, wraps others in InternalError.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error
  }

  if (error instanceof Error) {
    // Don't expose internal error messages in production
    const message =
      process.env.NODE_ENV === "production"
        ? "An unexpected error occurred"
        : error.message

    return new InternalError(message)
  }

  return new InternalError("An unexpected error occurred")
}
