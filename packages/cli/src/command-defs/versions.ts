import { z } from 'zod';
import { ModelIdSchema, VersionNumberSchema } from '@modelvault/core';
import { outputFormatSchema } from './models.js';

export const versionsRegisterSchema = z.object({
  modelId: ModelIdSchema,
  file: z.string().min(1, 'file is required'),
  metadata: z.string().min(1, 'metadata is required'),
  format: outputFormatSchema,
});

export const versionsShowSchema = z.object({
  modelId: ModelIdSchema,
  versionNumber: VersionNumberSchema,
  format: outputFormatSchema,
});

export const versionsDeleteSchema = versionsShowSchema;

export const versionsDownloadSchema = z.object({
  modelId: ModelIdSchema,
  versionNumber: VersionNumberSchema,
  /** Destination path; defaults to the artifact's file name in the working directory */
  out: z.string().min(1).optional(),
  format: outputFormatSchema,
});
