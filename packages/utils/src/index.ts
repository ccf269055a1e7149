/**
 * @modelvault/utils - Shared utilities package
 *
 * Logger, configuration loading and the error hierarchy used by every
 * other package. No database or storage code lives here.
 */

export { logger, Logger, createLogger, getLogLevel, resolveLogLevel, setLogLevel } from './logger.js';
export type { LogContext } from './logger.js';
export { createPackageLogger, LogHelpers } from './logging/index.js';

export * from './config/index.js';

export * from './errors.js';
export { handleError } from './error-handler.js';
export type { ErrorHandlerResult } from './error-handler.js';
