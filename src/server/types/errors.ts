/**
 * Centralized error type definitions for the content integrity service
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  // Client errors
  BAD_REQUEST = 'BAD_REQUEST',
  FORBIDDEN = 'FORBIDDEN',
  NOT_FOUND = 'NOT_FOUND',
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',

  // Analysis errors
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
  EXTRACTION_FAILED = 'EXTRACTION_FAILED',
  INSUFFICIENT_INPUT = 'INSUFFICIENT_INPUT',
  SCORING_ERROR = 'SCORING_ERROR',

  // Server errors
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.BAD_REQUEST, 400, true, context);
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.FORBIDDEN, 403, true, context);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    super(
      identifier ? `${resource} with identifier '${identifier}' not found` : `${resource} not found`,
      ErrorCode.NOT_FOUND,
      404,
      true,
      { resource, identifier }
    );
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(limitBytes?: number) {
    super(
      limitBytes ? `Request body exceeds the limit of ${limitBytes} bytes` : 'Request body is too large',
      ErrorCode.PAYLOAD_TOO_LARGE,
      413,
      true,
      limitBytes ? { limitBytes } : undefined
    );
  }
}

export class RateLimitError extends AppError {
  constructor(message: string = 'Too many requests', retryAfter?: number) {
    super(message, ErrorCode.RATE_LIMIT_EXCEEDED, 429, true, retryAfter ? { retryAfter } : undefined);
  }
}

/**
 * The document's declared format tag has no extractor.
 */
export class UnsupportedFormatError extends AppError {
  constructor(format: string, context?: Record<string, unknown>) {
    super(
      `Unsupported document format '${format}'. Supported formats: pdf, docx, plain`,
      ErrorCode.UNSUPPORTED_FORMAT,
      415,
      true,
      { format, ...context }
    );
  }
}

/**
 * The document container could not be read (corrupt or truncated bytes).
 */
export class ExtractionFailedError extends AppError {
  constructor(format: string, reason: string, context?: Record<string, unknown>) {
    super(
      `Text extraction from ${format} document failed: ${reason}`,
      ErrorCode.EXTRACTION_FAILED,
      422,
      true,
      { format, ...context }
    );
  }
}

/**
 * Extracted or pasted text is shorter than the configured minimum.
 */
export class InsufficientInputError extends AppError {
  constructor(actualLength: number, minLength: number) {
    super(
      `Please provide text of at least ${minLength} characters (received ${actualLength})`,
      ErrorCode.INSUFFICIENT_INPUT,
      422,
      true,
      { actualLength, minLength }
    );
  }
}

/**
 * A score provider failed internally. Never reaches the client as an error
 * response: the pipeline turns it into an error-labelled score.
 */
export class ScoringError extends AppError {
  public readonly provider: string;

  constructor(provider: string, message: string, cause?: unknown) {
    super(`Scorer '${provider}' failed: ${message}`, ErrorCode.SCORING_ERROR, 500, true, { provider });
    this.provider = provider;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, 500, false, context);
  }
}

/**
 * Standardized error response format
 */
export interface ErrorResponse {
  error: string;
  code: string;
  message: string;
  statusCode: number;
  timestamp: string;
  path?: string;
  context?: Record<string, unknown>;
  stack?: string; // Only in development
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Type guard to check if error is an operational error
 */
export function isOperationalError(error: unknown): boolean {
  return isAppError(error) && error.isOperational;
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
}

/**
 * Message of any thrown value
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
