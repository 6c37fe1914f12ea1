import pino from 'pino';
import type { Logger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * AsyncLocalStorage for request context (request ID, case ID, etc.)
 */
export const requestContext = new AsyncLocalStorage<Record<string, unknown>>();

/**
 * Get current request context
 */
export function getRequestContext(): Record<string, unknown> {
  return requestContext.getStore() || {};
}

const LOG_LEVELS: readonly pino.LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string): value is pino.LevelWithSilent {
  return LOG_LEVELS.some(level => level === value);
}

function resolveLogLevel(): pino.LevelWithSilent {
  const configured = process.env.LOG_LEVEL;
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  if (process.env.NODE_ENV === 'test') {
    return 'silent';
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

/**
 * Create a logger. Every line carries the current request context, including
 * lines from child loggers created before the request started.
 *
 * @param destination - Stream to write to instead of stdout (pretty printing is skipped)
 */
export function createLogger(
  destination?: pino.DestinationStream,
  level: pino.LevelWithSilent = resolveLogLevel()
): Logger {
  const prettyPrint = process.env.NODE_ENV === 'development' && !destination;
  const options: pino.LoggerOptions = {
    level,
    base: {
      env: process.env.NODE_ENV || 'development',
      service: 'visa-eligibility-engine',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    // pino merges each line's fields into the returned object
    mixin: () => ({ ...getRequestContext() }),
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(prettyPrint && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  };

  return destination ? pino(options, destination) : pino(options);
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  return logger.child(additionalContext);
}
