/**
 * @fractime/utils - Shared utilities package
 *
 * Logger, configuration loading and error handling for every fractime package.
 */

export { logger, Logger, winstonLogger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';

export * from './config/index.js';

export * from './errors.js';
export { handleError } from './error-handler.js';
export type { ErrorHandlerResult } from './error-handler.js';
