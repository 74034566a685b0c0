import rateLimit from 'express-rate-limit';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { RateLimitError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

export interface RateLimiterSettings {
    windowMs: number;
    limit: number;
}

/**
 * Rate limiter for the analysis endpoints
 *
 * Extraction and scoring are CPU bound, so requests are counted per client IP.
 * Rejections are passed to the error handler as RateLimitError; the
 * Retry-After header (RFC 6585) carries the window length in seconds.
 */
export function createAnalysisRateLimiter(settings: RateLimiterSettings): RequestHandler {
    const retryAfterSeconds = Math.ceil(settings.windowMs / 1000);

    return rateLimit({
        windowMs: settings.windowMs,
        limit: settings.limit,
        standardHeaders: 'draft-7', // Combined `RateLimit` header
        legacyHeaders: false, // Disable the `X-RateLimit-*` headers
        handler: (req: Request, res: Response, next: NextFunction) => {
            logger.warn({ ip: req.ip, path: req.path, limit: settings.limit }, 'Analysis rate limit exceeded');
            res.setHeader('Retry-After', retryAfterSeconds.toString());
            next(new RateLimitError('Too many analysis requests, please try again later.', retryAfterSeconds));
        },
    });
}
