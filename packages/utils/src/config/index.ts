/**
 * Configuration Management
 * ========================
 * Loads `.env`, validates the environment and caches the result.
 */

import 'dotenv/config';
import { envSchema, type EnvConfig } from './schema.js';
import { ConfigurationError } from '../errors.js';
import { logger, setLogLevel } from '../logger.js';

export { envSchema, LOG_LEVELS, STORAGE_METHODS } from './schema.js';
export type { EnvConfig, LogLevel, StorageMethod } from './schema.js';

let config: EnvConfig | null = null;

/**
 * Load and validate configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  if (config) {
    return config;
  }

  const result = envSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');

    throw new ConfigurationError(`Configuration validation failed: ${errors}`, undefined, {
      errors: result.error.issues,
    });
  }

  config = result.data;
  setLogLevel(config.LOG_LEVEL);

  logger.info('Configuration loaded successfully', {
    nodeEnv: config.NODE_ENV,
    storageMethod: config.MODEL_STORAGE_METHOD,
    logLevel: config.LOG_LEVEL,
  });

  return config;
}

/**
 * Drop the cached configuration (tests, reloads)
 */
export function resetConfig(): void {
  config = null;
}
