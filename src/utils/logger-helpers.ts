/**
 * Logger Helpers
 *
 * Lazy evaluation of log context objects for the routing and recording hot
 * path: the context is only built when the level is enabled.
 */

import type { Logger } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @param logger - Pino logger instance (can be undefined)
 * @param contextBuilder - Builds the context object (only called if logging)
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ model, endpointId }), 'Routed request');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}

/**
 * Render an unknown thrown value for a log context
 */
export function describeError(error: unknown): LogContext {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { error: error.message, errorName: error.name, ...(code ? { code } : {}) };
  }
  return { error: String(error) };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
