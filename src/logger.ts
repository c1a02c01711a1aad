/**
 * pino logger factory
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';
import { loadConfig } from './config';

export type { Logger };

export interface LoggerOptions {
  name?: string;
  level?: LevelWithSilent;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  return pino({
    name: opts.name ?? 'order-analytics',
    level: opts.level ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

let defaultLogger: Logger | null = null;

/** Process-wide logger, configured from the environment on first use */
export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger({ level: loadConfig().LOG_LEVEL });
  }
  return defaultLogger;
}
