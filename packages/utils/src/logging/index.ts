/**
 * Package-aware logging
 * =====================
 *
 * Usage:
 * ```typescript
 * import { createPackageLogger } from '@gridtrend/utils';
 *
 * const logger = createPackageLogger('@gridtrend/workflows');
 * logger.info('Series extracted', { source: 'hist.nc' });
 * ```
 */

import { Logger, createLogger } from '../logger.js';
import type { LogContext } from '../logger.js';

/**
 * Package logger registry
 */
const packageLoggers = new Map<string, Logger>();

/**
 * Create or retrieve a package-specific logger
 */
export function createPackageLogger(packageName: string): Logger {
  const existing = packageLoggers.get(packageName);
  if (existing) {
    return existing;
  }

  const packageLogger = createLogger(packageName);
  packageLoggers.set(packageName, packageLogger);
  return packageLogger;
}

/**
 * Structured log utilities for common pipeline events
 */
export class LogHelpers {
  /**
   * Log a completed pipeline stage with timing
   */
  static stage(logger: Pick<Logger, 'debug'>, stage: string, durationMs: number, context?: LogContext): void {
    logger.debug('Pipeline stage completed', { stage, durationMs, ...context });
  }

  /**
   * Log a file read
   */
  static fileRead(logger: Pick<Logger, 'debug'>, path: string, bytes: number, context?: LogContext): void {
    logger.debug('Grid file read', { path, bytes, ...context });
  }
}
