/**
 * Custom error classes for structured error handling.
 *
 * Usage:
 *   throw new UnsupportedFileTypeError(".txt")
 *   throw new ValidationError("Invalid input", [{ field: "chunkSize", message: "Must be positive" }])
 *   throw new StageFailedError("classify", error)
 *
 * At the CLI boundary:
 *   catch (error) {
 *     const appError = toAppError(error)
 *     console.error(JSON.stringify(appError.toJSON(), null, 2))
 *     process.exitCode = 1
 *   }
 */

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "INTERNAL_ERROR"
  | "CONFIGURATION_ERROR"
  // Domain-specific error codes for the compliance review pipeline
  | "UNSUPPORTED_FILE_TYPE"
  | "ENCRYPTED_DOCUMENT"
  | "CORRUPT_DOCUMENT"
  | "SCRAPE_FAILED"
  | "EMBEDDING_FAILED"
  | "LLM_FAILED"
  | "LLM_OUTPUT_INVALID"
  | "STAGE_FAILED"

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
 * 404 Not Found - File or resource doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super("NOT_FOUND", message, 404)
  }
}

/**
 * 500 Internal Error - Unexpected error
 */
export class InternalError extends AppError {
  constructor(message = "An unexpected error occurred") {
    super("INTERNAL_ERROR", message, 500)
  }
}

/**
 * 500 Configuration Error - Missing or invalid environment settings.
 * Raised at startup, before any stage runs.
 */
export class ConfigurationError extends AppError {
  constructor(message = "Invalid configuration", details?: ErrorDetail[]) {
    super("CONFIGURATION_ERROR", message, 500, details)
  }
}

/**
 * 415 Unsupported File Type - Extension outside the supported reader set
 */
export class UnsupportedFileTypeError extends AppError {
  constructor(public readonly extension: string) {
    super(
      "UNSUPPORTED_FILE_TYPE",
      `Unsupported file type: ${extension || "(none)"}. Supported types are .docx and .pdf`,
      415
    )
  }
}

/**
 * 422 Encrypted Document - Password-protected PDF
 */
export class EncryptedDocumentError extends AppError {
  constructor(message = "This document is password-protected. Remove the password and try again.") {
    super("ENCRYPTED_DOCUMENT", message, 422)
  }
}

/**
 * 422 Corrupt Document - File could not be parsed
 */
export class CorruptDocumentError extends AppError {
  constructor(message = "Could not read this document. The file may be damaged.") {
    super("CORRUPT_DOCUMENT", message, 422)
  }
}

/**
 * 502 Scrape Failed - Remote page could not be fetched
 */
export class ScrapeFailedError extends AppError {
  constructor(
    public readonly url: string,
    message = `Failed to fetch ${url}`
  ) {
    super("SCRAPE_FAILED", message, 502)
  }
}

/**
 * 500 Embedding Failed - Vector embedding generation error
 */
export class EmbeddingFailedError extends AppError {
  constructor(message = "Embedding generation failed") {
    super("EMBEDDING_FAILED", message, 500)
  }
}

/**
 * 500 LLM Failed - Language model API error
 */
export class LlmFailedError extends AppError {
  constructor(message = "Language model request failed") {
    super("LLM_FAILED", message, 500)
  }
}

/**
 * 502 LLM Output Invalid - Model response did not match the expected contract.
 * Carries a truncated copy of the raw response for diagnostics.
 */
export class LlmOutputError extends AppError {
  constructor(
    message = "Language model returned an invalid response",
    public readonly rawText?: string,
    details?: ErrorDetail[]
  ) {
    super("LLM_OUTPUT_INVALID", message, 502, details)
  }
}

/**
 * Pipeline stage failure. Wraps the underlying error with the stage name;
 * later stages do not run once this is raised.
 */
export class StageFailedError extends AppError {
  constructor(
    public readonly stage: string,
    public readonly stageError: AppError
  ) {
    super("STAGE_FAILED", `Stage "${stage}" failed: ${stageError.message}`, stageError.statusCode, [
      { field: stage, message: stageError.message, code: stageError.code },
    ])
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
    return new InternalError(error.message)
  }

  return new InternalError("An unexpected error occurred")
}
