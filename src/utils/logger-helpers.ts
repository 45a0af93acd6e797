/**
 * Logger helpers
 *
 * Root logger construction and lazy evaluation of log context objects. The
 * admission and drain paths run on every release, so their debug context is
 * only built when debug logging is enabled.
 */

import { pino, type Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

export const LOG_LEVEL_ENV = 'GPU_GATEWAY_LOG_LEVEL';

const LEVELS: ReadonlySet<string> = new Set(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

/**
 * Create the process-wide root logger.
 *
 * `GPU_GATEWAY_LOG_LEVEL` overrides the configured level when it names a
 * valid pino level.
 */
export function createRootLogger(level: string, name = 'gpu-gateway'): Logger {
  const override = process.env[LOG_LEVEL_ENV];
  const finalLevel = override && LEVELS.has(override) ? override : level;
  return pino({ name, level: finalLevel });
}

export function childLogger(parent: Logger | undefined, component: string): Logger | undefined {
  return parent?.child({ component });
}

/**
 * Log with a context object that is only built if the level is enabled
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ jobId, free: ledger.freeVram(id) }), 'Job admitted');
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
