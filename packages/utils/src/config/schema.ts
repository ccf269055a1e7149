/**
 * Configuration Schema
 * ====================
 * Zod schema for validating the registry's environment variables.
 */

import { z } from 'zod';

export const STORAGE_METHODS = ['local'] as const;

export type StorageMethod = (typeof STORAGE_METHODS)[number];

/**
 * winston's npm levels the registry logs at
 */
export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Environment configuration schema
 */
export const envSchema = z.object({
  // Artifact storage
  MODEL_STORAGE_PATH: z.string().min(1, 'MODEL_STORAGE_PATH is required'),
  MODEL_STORAGE_METHOD: z.enum(STORAGE_METHODS).default('local'),

  // Metadata store
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),

  // HTTP server
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(8000),

  // Logging
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type EnvConfig = z.infer<typeof envSchema>;
