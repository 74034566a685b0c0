import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * AsyncLocalStorage for request context (request ID, method, path)
 */
export const requestContext = new AsyncLocalStorage<Record<string, unknown>>();

/**
 * Get current request context
 */
export function getRequestContext(): Record<string, unknown> {
  return requestContext.getStore() || {};
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

function resolveLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? fallback;
}

/**
 * Create logger instance based on environment
 *
 * LOG_DESTINATION=stderr keeps stdout free for command-line output.
 */
function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isDevelopment = nodeEnv === 'development';
  const usePretty = process.env.LOG_PRETTY ? process.env.LOG_PRETTY === 'true' : isDevelopment;
  const destination = process.env.LOG_DESTINATION === 'stderr' ? 2 : 1;

  const options: LoggerOptions = {
    level: resolveLogLevel(process.env.LOG_LEVEL, isDevelopment ? 'debug' : 'info'),
    base: {
      env: nodeEnv,
      service: 'content-integrity-api',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    // Request context is read per log call so child loggers created at import time stay request-aware
    mixin: () => getRequestContext(),
  };

  if (usePretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination,
        },
      },
    });
  }

  return pino(options, pino.destination(destination));
}

/**
 * Main logger instance
 */
export const logger = createLogger();
