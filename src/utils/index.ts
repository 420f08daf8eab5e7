export * from './errors.js';
export * from './exec.js';
export { logger, Logger, levelFromEnv } from './logger.js';
