export { createLogger, isLogLevel, logger } from './logger.js';
export type { Logger, LevelWithSilent, LoggerOptions } from './logger.js';
