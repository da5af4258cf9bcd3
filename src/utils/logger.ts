/**
 * Logger factory
 *
 * All components take an optional pino Logger; the CLI builds the root
 * logger here and hands children down.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';

const LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function isLogLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

export interface LoggerOptions {
  name?: string;
  level?: string;
  /** Used when neither level nor PID_SIM_LOG_LEVEL is set */
  defaultLevel?: LevelWithSilent;
}

/**
 * Create the root logger.
 *
 * Level precedence: explicit option, PID_SIM_LOG_LEVEL, defaultLevel, 'info'.
 * Unknown level names fall back to the default.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const fallback = options.defaultLevel ?? DEFAULT_LOG_LEVEL;
  const requested = options.level ?? process.env.PID_SIM_LOG_LEVEL ?? fallback;
  const level = isLogLevel(requested) ? requested : fallback;

  return pino({
    name: options.name ?? 'pid-sim',
    level,
  });
}
