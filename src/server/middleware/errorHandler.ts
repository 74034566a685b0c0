import type { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger.js';
import { transformErrorToResponse } from '../utils/errorTransformation.js';
import { isOperationalError } from '../types/errors.js';
import { isDevelopment } from '../config/env.js';

/**
 * Centralized error handling middleware
 * Must be registered LAST in Express app
 *
 * This middleware:
 * - Transforms all errors to standardized ErrorResponse format
 * - Logs errors with appropriate context
 * - Returns consistent error responses to clients
 */
export function errorHandler(
    err: unknown,
    req: Request,
    res: Response,
    next: NextFunction
): void {
    const errorResponse = transformErrorToResponse(err, req, isDevelopment());

    // Operational errors are expected outcomes (bad input, unreadable documents)
    if (isOperationalError(err) || errorResponse.statusCode < 500) {
        logger.info({
            code: errorResponse.code,
            statusCode: errorResponse.statusCode,
            message: errorResponse.message,
        }, 'Request rejected');
    } else {
        logger.error({
            error: err,
            method: req.method,
            path: req.path,
        }, 'Unhandled error');
    }

    // Response already started: let Express close the connection
    if (res.headersSent) {
        next(err);
        return;
    }

    res.status(errorResponse.statusCode).json(errorResponse);
}
