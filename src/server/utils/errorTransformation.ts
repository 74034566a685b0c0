/**
 * Error transformation utilities
 * Converts various error types to the standardized error response
 */
import type { Request } from 'express';
import { STATUS_CODES } from 'http';
import {
  AppError,
  BadRequestError,
  ErrorCode,
  PayloadTooLargeError,
  toAppError,
  type ErrorResponse,
} from '../types/errors.js';

/**
 * Errors raised by Express body parsers (http-errors) carry an HTTP status
 * and a machine-readable type such as `entity.parse.failed`.
 */
function fromBodyParserError(error: unknown): AppError | null {
  if (!(error instanceof Error) || !('status' in error) || typeof error.status !== 'number') {
    return null;
  }
  const type = 'type' in error && typeof error.type === 'string' ? error.type : undefined;
  const limit = 'limit' in error && typeof error.limit === 'number' ? error.limit : undefined;

  if (error.status === 413) {
    return new PayloadTooLargeError(limit);
  }
  if (error.status === 400) {
    return new BadRequestError(
      type === 'entity.parse.failed' ? 'Request body is not valid JSON' : error.message,
      type ? { type } : undefined
    );
  }
  if (error.status > 400 && error.status < 500) {
    return new AppError(error.message, ErrorCode.BAD_REQUEST, error.status, true, type ? { type } : undefined);
  }
  return null;
}

/**
 * Transform error to standardized error response
 *
 * Operational errors keep their message; anything else is reported as a
 * generic internal error unless stack traces are requested (development).
 */
export function transformErrorToResponse(
  error: unknown,
  req: Pick<Request, 'originalUrl'>,
  includeStack = false
): ErrorResponse {
  const appError = fromBodyParserError(error) ?? toAppError(error);

  const exposeMessage = appError.isOperational || includeStack;
  const message = exposeMessage ? appError.message : 'An unexpected error occurred';

  return {
    error: STATUS_CODES[appError.statusCode] ?? 'Error',
    code: appError.code,
    message,
    statusCode: appError.statusCode,
    timestamp: new Date().toISOString(),
    path: req.originalUrl.split('?')[0],
    ...(appError.context && exposeMessage ? { context: appError.context } : {}),
    ...(includeStack && appError.stack ? { stack: appError.stack } : {}),
  };
}
