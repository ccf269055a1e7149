/**
 * Model Command Definitions
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { ModelIdSchema } from '@modelvault/core';

export const outputFormatSchema = z.enum(['json', 'table']).default('table');

export const modelsListSchema = z.object({
  format: outputFormatSchema,
});

export const modelsShowSchema = z.object({
  modelId: ModelIdSchema,
  format: outputFormatSchema,
});

/**
 * `metadata` is the JSON document the HTTP upload takes in its metadata field
 */
export const modelsRegisterSchema = z.object({
  file: z.string().min(1, 'file is required'),
  metadata: z.string().min(1, 'metadata is required'),
  format: outputFormatSchema,
});

export const modelsUpdateSchema = z.object({
  modelId: ModelIdSchema,
  name: z.string().optional(),
  description: z.string().optional(),
  createdBy: z.string().optional(),
  /** Replacement tags as a JSON object */
  tags: z.string().optional(),
  format: outputFormatSchema,
});

export const modelsDeleteSchema = z.object({
  modelId: ModelIdSchema,
  format: outputFormatSchema,
});
