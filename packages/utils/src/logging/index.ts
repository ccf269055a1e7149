/**
 * Package-aware logging
 *
 * Usage:
 * ```typescript
 * import { createPackageLogger } from '@modelvault/utils';
 *
 * const logger = createPackageLogger('@modelvault/storage');
 * logger.info('Artifact saved', { modelKey: 'resnet_50', versionNumber: 1 });
 * ```
 */

import { Logger, createLogger } from '../logger.js';
import type { LogContext } from '../logger.js';

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
 * Structured log helpers for common operations
 */
export class LogHelpers {
  static apiResponse(
    logger: Logger,
    method: string,
    url: string,
    statusCode: number,
    duration: number,
    context?: LogContext
  ): void {
    const level = statusCode >= 400 ? 'warn' : 'debug';
    logger[level]('API Response', { method, url, statusCode, duration, ...context });
  }
}
