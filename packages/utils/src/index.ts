/**
 * @gridtrend/utils - Shared utilities package
 *
 * Exports only:
 * - Logger utilities
 * - Configuration loading
 * - Error handling
 */

// Logger and logging utilities
export { logger, Logger, createLogger, getLoggerConfig } from './logger.js';
export type { LogContext, LoggerConfig } from './logger.js';
export { createPackageLogger, LogHelpers } from './logging/index.js';

// Configuration loading
export * from './config/index.js';

// Error handling
export * from './errors.js';
export { handleError } from './error-handler.js';
export type { ErrorHandlerResult } from './error-handler.js';
