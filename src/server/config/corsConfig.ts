/**
 * CORS Configuration
 *
 * Configures CORS (Cross-Origin Resource Sharing) for the Express application.
 */
import type { CorsOptions } from 'cors';
import { ForbiddenError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import type { Env } from './env.js';

const DEFAULT_ORIGINS = [
  'http://localhost:5173',
  'http://localhost:3000',
  'http://127.0.0.1:5173',
  'http://127.0.0.1:3000',
];

/**
 * Check if an origin is allowed
 */
export function isOriginAllowed(origin: string | undefined, allowedOrigins: string[]): boolean {
  // Allow requests with no origin (curl, the CLI, server-to-server calls)
  if (!origin) {
    return true;
  }

  return allowedOrigins.includes(origin);
}

/**
 * Parse ALLOWED_ORIGINS (comma separated).
 *
 * Outside production an empty list falls back to the local dev origins;
 * in production only configured origins are allowed.
 */
export function parseAllowedOrigins(value: string | undefined, nodeEnv: Env['NODE_ENV']): string[] {
  const origins = (value ?? '')
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
  if (origins.length > 0 || nodeEnv === 'production') {
    return origins;
  }
  return DEFAULT_ORIGINS;
}

/**
 * Get CORS configuration options
 */
export function getCorsOptions(env: Pick<Env, 'ALLOWED_ORIGINS' | 'NODE_ENV'>): CorsOptions {
  const allowedOrigins = parseAllowedOrigins(env.ALLOWED_ORIGINS, env.NODE_ENV);

  logger.info({ allowedOrigins, fromEnv: !!env.ALLOWED_ORIGINS }, 'CORS: Configured allowed origins');

  return {
    origin: (origin, callback) => {
      if (isOriginAllowed(origin, allowedOrigins)) {
        callback(null, true);
        return;
      }

      // Only in development to avoid log spam
      if (env.NODE_ENV === 'development') {
        logger.warn({ origin, allowedOrigins }, 'CORS: Origin not allowed');
      }
      callback(new ForbiddenError('Origin not allowed by CORS', { origin }));
    },
    optionsSuccessStatus: 200,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    exposedHeaders: ['X-Request-ID', 'Retry-After'],
  };
}
