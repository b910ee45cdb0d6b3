/**
 * Root logger factory
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';

/**
 * Create the process logger. Components derive children with
 * `logger.child({ component })`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'model-rollout-controller',
    level: options.level ?? DEFAULT_LOG_LEVEL,
  });
}
