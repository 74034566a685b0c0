/**
 * Express application factory
 *
 * Kept separate from the server entry point so tests can mount the app on an
 * ephemeral port with their own pipeline.
 */
import express, { type Express } from 'express';
import type { Env } from './config/env.js';
import { setupMiddleware } from './config/middlewareConfig.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createAnalysisRateLimiter } from './middleware/rateLimiter.js';
import { createAnalysisRouter } from './routes/analysisRoutes.js';
import { createHealthRouter } from './routes/healthRoutes.js';
import type { AnalysisPipeline } from './services/analysis/AnalysisPipeline.js';
import { NotFoundError } from './types/errors.js';

export type AppSettings = Pick<
  Env,
  'NODE_ENV' | 'ALLOWED_ORIGINS' | 'MAX_UPLOAD_BYTES' | 'RATE_LIMIT_WINDOW_MS' | 'RATE_LIMIT_MAX'
>;

export function createApp(pipeline: AnalysisPipeline, settings: AppSettings): Express {
  const app = express();

  setupMiddleware(app, settings);

  app.use(createHealthRouter(pipeline));
  app.use(
    '/api/analysis',
    createAnalysisRateLimiter({ windowMs: settings.RATE_LIMIT_WINDOW_MS, limit: settings.RATE_LIMIT_MAX }),
    createAnalysisRouter(pipeline, { maxUploadBytes: settings.MAX_UPLOAD_BYTES })
  );

  // Unknown routes
  app.use((req, _res, next) => {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
  });

  // Must be registered last
  app.use(errorHandler);

  return app;
}
