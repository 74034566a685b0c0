/**
 * Middleware Configuration
 *
 * Configures the application-wide Express middleware.
 */

import type { Express } from 'express';
import express from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import { requestIdMiddleware } from '../middleware/requestId.js';
import { getCorsOptions } from './corsConfig.js';
import type { Env } from './env.js';

export type MiddlewareSettings = Pick<Env, 'ALLOWED_ORIGINS' | 'NODE_ENV'>;

/**
 * Setup all application middleware
 */
export function setupMiddleware(app: Express, settings: MiddlewareSettings): void {
  // Middleware order matters:

  // 1. Request ID and logging context - must be first
  app.use(requestIdMiddleware);

  // 2. Security headers; the API serves JSON only
  app.use(helmet());

  // 3. CORS - before other middleware that might set headers
  app.use(cors(getCorsOptions(settings)));

  // 4. Response compression (reports echo the extracted text)
  app.use(compression({
    threshold: 1024, // Only compress responses > 1KB
    level: 6,
    filter: (req, res) => {
      if (req.headers['x-no-compression']) {
        return false;
      }
      return compression.filter(req, res);
    },
  }));

  // 5. JSON body parsing for pasted text; document uploads use a raw parser on their route
  app.use(express.json({ limit: '2mb' }));
}
