import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { requestContext, logger } from '../utils/logger.js';

/**
 * Middleware to generate and attach request ID to each request
 * Also sets up async context for logging
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  // Generate or use existing request ID
  const requestId = req.get('x-request-id') || randomUUID();

  // Set request ID in response header
  res.setHeader('X-Request-ID', requestId);

  const context: Record<string, unknown> = {
    requestId,
    method: req.method,
    path: req.path,
    ip: req.ip || req.socket.remoteAddress,
  };

  // Run request in async context
  requestContext.run(context, () => {
    logger.info({
      query: req.query,
      contentType: req.get('content-type'),
      contentLength: req.get('content-length'),
    }, 'Incoming request');

    res.on('finish', () => {
      logger.info({ statusCode: res.statusCode }, 'Request completed');
    });

    next();
  });
}
