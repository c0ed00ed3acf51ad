export { Logger, createLogger, parseLogLevel, isLogLevel, LOG_LEVELS } from './logger.js';
export type { LogLevel } from './logger.js';
export { env, envNumber } from './env.js';
export { nowIso } from './date.js';
