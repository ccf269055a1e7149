/**
 * Row schemas
 *
 * sqlite3 hands rows back untyped; these schemas validate them and map
 * snake_case columns to the camelCase domain records. JSON columns are stored
 * as text.
 */

import { z } from 'zod';
import {
  MetricsSchema,
  ParametersSchema,
  TagsSchema,
  type AliasRecord,
  type ModelRecord,
  type VersionWithAlias,
} from '@modelvault/core';

function jsonColumn<T extends z.ZodTypeAny>(schema: T) {
  return z
    .string()
    .transform((raw, ctx): unknown => {
      try {
        return JSON.parse(raw);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Column does not hold valid JSON' });
        return z.NEVER;
      }
    })
    .pipe(schema);
}

export const ModelRowSchema = z
  .object({
    model_id: z.number().int(),
    name: z.string(),
    name_key: z.string(),
    storage_key: z.string(),
    description: z.string(),
    created_by: z.string(),
    tags: jsonColumn(TagsSchema),
    latest_version_number: z.number().int(),
    created_at: z.string(),
    updated_at: z.string(),
  })
  .transform(
    (row): ModelRecord => ({
      modelId: row.model_id,
      name: row.name,
      nameKey: row.name_key,
      storageKey: row.storage_key,
      description: row.description,
      createdBy: row.created_by,
      tags: row.tags,
      latestVersionNumber: row.latest_version_number,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    })
  );

export const AliasRowSchema = z
  .object({
    alias_id: z.number().int(),
    name: z.string(),
    version_id: z.number().int(),
    created_at: z.string(),
  })
  .transform(
    (row): AliasRecord => ({
      aliasId: row.alias_id,
      name: row.name,
      versionId: row.version_id,
      createdAt: row.created_at,
    })
  );

/**
 * A version row LEFT JOINed with its alias (alias_* columns null when absent)
 */
export const VersionRowSchema = z
  .object({
    version_id: z.number().int(),
    model_id: z.number().int(),
    version_number: z.number().int(),
    description: z.string(),
    created_by: z.string(),
    tags: jsonColumn(TagsSchema),
    metrics: jsonColumn(MetricsSchema),
    parameters: jsonColumn(ParametersSchema),
    file_name: z.string(),
    artifact_status: z.enum(['pending', 'stored', 'missing']),
    created_at: z.string(),
    updated_at: z.string(),
    alias_id: z.number().int().nullable(),
    alias_name: z.string().nullable(),
    alias_created_at: z.string().nullable(),
  })
  .transform(
    (row): VersionWithAlias => ({
      versionId: row.version_id,
      modelId: row.model_id,
      versionNumber: row.version_number,
      description: row.description,
      createdBy: row.created_by,
      tags: row.tags,
      metrics: row.metrics,
      parameters: row.parameters,
      fileName: row.file_name,
      artifactStatus: row.artifact_status,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      alias:
        row.alias_id !== null && row.alias_name !== null && row.alias_created_at !== null
          ? {
              aliasId: row.alias_id,
              name: row.alias_name,
              versionId: row.version_id,
              createdAt: row.alias_created_at,
            }
          : null,
    })
  );

export const CountRowSchema = z.object({ count: z.number().int() });
