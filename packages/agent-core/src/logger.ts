/**
 * Logger factory.
 *
 * Components take a pino `Logger` in their options and derive children with
 * run-scoped bindings (`agent`, `taskId`). Tests run with level `silent`.
 */

import { pino, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export interface CreateLoggerOptions {
  name?: string;
  level?: string;
  /** Write to stderr so stdout stays free for answers */
  destination?: 'stdout' | 'stderr';
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const pinoOptions: LoggerOptions = {
    name: options.name ?? 'conclave',
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const fd = options.destination === 'stdout' ? 1 : 2;
  return pino(pinoOptions, pino.destination({ fd, sync: true }));
}

let defaultLogger: Logger | undefined;

/**
 * Process default logger, used when a component gets none.
 */
export function useLogger(): Logger {
  defaultLogger ??= createLogger();
  return defaultLogger;
}

/**
 * A logger that drops everything.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
