/**
 * Logging for valtree, on pino (the logger Fastify ships with).
 *
 * The engine logs sparingly: configuration errors at `error`, lossy
 * conversions and broken translations at `warn`, per-validation summaries
 * at `debug`.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger, LevelWithSilent };

const LOG_LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

/**
 * Options for creating a logger.
 */
export interface LoggerOptions {
  /** Log level (default: VALTREE_LOG_LEVEL or 'info') */
  level?: LevelWithSilent;
  /** Logger name (default: 'valtree') */
  name?: string;
}

/**
 * Check whether a string is a pino level name.
 */
export function isLogLevel(value: string): value is LevelWithSilent {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function levelFromEnv(): LevelWithSilent | undefined {
  const raw = process.env.VALTREE_LOG_LEVEL;
  return raw !== undefined && isLogLevel(raw) ? raw : undefined;
}

/**
 * Create a pino logger.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'valtree',
    level: options.level ?? levelFromEnv() ?? 'info',
  });
}

/**
 * Default logger shared by components that are not given one.
 */
export const logger: Logger = createLogger();
