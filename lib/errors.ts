/**
 * Custom error classes for structured error handling.
 *
 * Usage:
 *   throw new NotFoundError("Regulation not found")
 *   throw new ValidationError("Invalid input", [{ field: "regulation_id", message: "Required" }])
 *   throw new ServiceUnavailableError() // Uses default message
 *
 * Route handlers built with `createHandler` convert any thrown AppError into
 * the `{ success: false, error }` envelope with the matching status code.
 */

export type ErrorCode =
  | "BAD_REQUEST"
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "PAYLOAD_TOO_LARGE"
  | "INTERNAL_ERROR"
  | "SERVICE_UNAVAILABLE"
  // Compliance pipeline
  | "ANALYSIS_FAILED"
  // Document extraction
  | "CORRUPT_DOCUMENT"
  | "ENCRYPTED_DOCUMENT"

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
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
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
 * 400 Bad Request - Generic client error
 */
export class BadRequestError extends AppError {
  constructor(message = "Bad request", details?: ErrorDetail[]) {
    super("BAD_REQUEST", message, 400, details)
  }
}

/**
 * 400 Validation Error - Input validation failed
 */
export class ValidationError extends AppError {
  constructor(message = "Validation failed", details?: ErrorDetail[]) {
    super("VALIDATION_ERROR", message, 400, details)
  }

  static fromZodError(
    error: { issues: Array<{ path: PropertyKey[]; message: string }> },
    message = "Validation failed"
  ): ValidationError {
    const details = error.issues.map((e) => ({
      field: e.path.map(String).join("."),
      message: e.message,
    }))
    return new ValidationError(message, details)
  }
}

/**
 * 404 Not Found - Resource doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super("NOT_FOUND", message, 404)
  }
}

/**
 * 413 Payload Too Large - Upload exceeds the configured limit
 */
export class PayloadTooLargeError extends AppError {
  constructor(message = "File too large") {
    super("PAYLOAD_TOO_LARGE", message, 413)
  }
}

/**
 * 500 Internal Error - Unexpected server error
 */
export class InternalError extends AppError {
  constructor(message = "An unexpected error occurred") {
    super("INTERNAL_ERROR", message, 500)
  }
}

/**
 * 503 Service Unavailable - Dependency unavailable
 */
export class ServiceUnavailableError extends AppError {
  constructor(message = "Service temporarily unavailable") {
    super("SERVICE_UNAVAILABLE", message, 503)
  }
}

/**
 * 500 Analysis Failed - model call for a regulation or compliance check failed
 */
export class AnalysisFailedError extends AppError {
  constructor(message = "Analysis failed", details?: ErrorDetail[]) {
    super("ANALYSIS_FAILED", message, 500, details)
  }
}

/**
 * 422 Corrupt Document - file could not be parsed
 */
export class CorruptDocumentError extends AppError {
  constructor(message = "This file appears to be corrupt or in an unsupported format.") {
    super("CORRUPT_DOCUMENT", message, 422)
  }
}

/**
 * 422 Encrypted Document - password-protected PDF
 */
export class EncryptedDocumentError extends AppError {
  constructor(message = "This PDF is password-protected. Please upload an unprotected version.") {
    super("ENCRYPTED_DOCUMENT", message, 422)
  }
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
