/**
 * Standardized Logger Utility
 *
 * Thin wrapper around Pino. Reports go to stdout, so log lines are written to stderr.
 */

import pino from 'pino';

export type { Logger } from 'pino';

/**
 * Create a Pino logger writing to stderr
 */
export function createLogger(options: pino.LoggerOptions = {}): pino.Logger {
  return pino(
    {
      name: 'compose-topology',
      level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'development' ? 'debug' : 'info'),
      ...options,
    },
    pino.destination({ dest: 2, sync: true }),
  );
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => number;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => void;
}

/**
 * Create a performance timer for an operation
 */
export function createTimer(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): Timer {
  const startTime = Date.now();

  logger.debug({ operation, ...context }, `Starting ${operation}`);

  return {
    end(additionalContext: Record<string, unknown> = {}): number {
      const duration = Date.now() - startTime;

      logger.debug(
        {
          operation,
          duration_ms: duration,
          ...context,
          ...additionalContext,
        },
        `Completed ${operation} in ${duration}ms`,
      );

      return duration;
    },

    error(error: unknown, additionalContext: Record<string, unknown> = {}): void {
      const duration = Date.now() - startTime;

      logger.error(
        {
          operation,
          duration_ms: duration,
          error: error instanceof Error ? error.message : String(error),
          ...context,
          ...additionalContext,
        },
        `Failed ${operation} after ${duration}ms`,
      );
    },
  };
}
