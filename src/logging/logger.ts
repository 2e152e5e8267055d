/**
 * Logging for the broker and client libraries.
 *
 * One pino root logger per process; components log through child loggers
 * tagged with their name. The same instance is handed to fastify.
 */

import { pino, type Logger } from 'pino';
import type { LogLevel } from '../config/types.js';

export type { Logger };

export function createLogger(level: LogLevel = 'info', name = 'instrument-broker'): Logger {
  return pino({
    name,
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function componentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}

/**
 * Logger used when a caller supplies none.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
