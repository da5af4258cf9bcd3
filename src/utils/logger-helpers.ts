/**
 * Lazy logging
 *
 * The simulation loop can log thousands of samples per second; context
 * objects are only built when the level is enabled.
 */

import type { Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * @example
 * lazyLog(logger, 'debug', () => ({ sample }), 'Recorded sample');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: () => Record<string, unknown>,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
