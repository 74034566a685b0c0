import { createServer } from 'http';
import { createApp } from './app.js';
import { validateEnv } from './config/env.js';
import { createAnalysisPipeline } from './services/analysis/index.js';
import { logger } from './utils/logger.js';

const SHUTDOWN_TIMEOUT_MS = 10000;

function startServer(): void {
  const startupStartTime = Date.now();

  // Fails fast on invalid environment or policy
  const env = validateEnv();
  const pipeline = createAnalysisPipeline(env);
  const app = createApp(pipeline, env);
  const httpServer = createServer(app);

  httpServer.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EADDRINUSE') {
      logger.fatal({ port: env.PORT, error: error.message }, 'Port already in use');
      process.exit(1);
    }
    logger.error({ error }, 'HTTP server error');
  });

  httpServer.on('listening', () => {
    logger.info({
      port: env.PORT,
      api: `http://localhost:${env.PORT}/api/analysis`,
      scorers: pipeline.describeScorers(),
      startupDurationMs: Date.now() - startupStartTime,
    }, 'Server started successfully and listening');
  });

  let shuttingDown = false;
  const gracefulShutdown = (signal: string): void => {
    if (shuttingDown) {
      logger.warn('Shutdown already in progress, forcing exit');
      process.exit(1);
    }
    shuttingDown = true;
    logger.info({ signal }, 'Starting graceful shutdown');

    const forceExit = setTimeout(() => {
      logger.error({ reason: 'timeout' }, 'Graceful shutdown timeout, forcing exit');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    httpServer.close((error) => {
      if (error) {
        logger.error({ error }, 'Error while closing HTTP server');
        process.exit(1);
      }
      logger.info('Graceful shutdown completed successfully');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  httpServer.listen(env.PORT);
}

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason: unknown) => {
  logger.error({ reason: reason instanceof Error ? reason : { reason: String(reason) } }, 'Unhandled promise rejection');
});

// Handle uncaught exceptions
process.on('uncaughtException', (error: Error) => {
  logger.fatal({ error }, 'Uncaught exception - shutting down');
  process.exit(1);
});

try {
  startServer();
} catch (error) {
  logger.fatal({ error }, 'Failed to start server');
  process.exit(1);
}
