/**
 * Registry input schemas
 *
 * Zod schemas for everything a caller hands the registry engine. The engine
 * validates with these before touching either store; the HTTP and CLI layers
 * reuse them.
 */

import { z } from 'zod';
import type { JsonValue } from '../types/registry.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

export const TagsSchema = z.record(z.string(), JsonValueSchema);

export const MetricsSchema = z.record(z.string(), z.number());

export const ParametersSchema = z.record(z.string(), JsonValueSchema);

/**
 * Required, non-blank string. The value itself is kept verbatim.
 */
function requiredText(field: string) {
  return z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .min(1, `${field} must not be empty`)
    .refine((value) => value.trim().length > 0, { message: `${field} must not be blank` });
}

export const RegisterModelInputSchema = z.object({
  name: requiredText('name'),
  description: requiredText('description'),
  createdBy: requiredText('createdBy'),
  tags: TagsSchema.default({}),
  versionDescription: requiredText('versionDescription'),
  versionMetrics: MetricsSchema.default({}),
  versionParameters: ParametersSchema.default({}),
  versionTags: TagsSchema.default({}),
  versionAlias: requiredText('versionAlias').nullish(),
});

export type RegisterModelInput = z.input<typeof RegisterModelInputSchema>;
export type ValidRegisterModelInput = z.output<typeof RegisterModelInputSchema>;

export const RegisterVersionInputSchema = z.object({
  description: requiredText('description'),
  createdBy: requiredText('createdBy'),
  tags: TagsSchema.default({}),
  metrics: MetricsSchema.default({}),
  parameters: ParametersSchema.default({}),
  alias: requiredText('alias').nullish(),
});

export type RegisterVersionInput = z.input<typeof RegisterVersionInputSchema>;
export type ValidRegisterVersionInput = z.output<typeof RegisterVersionInputSchema>;

/**
 * Patch semantics: only supplied fields change
 */
export const UpdateModelInputSchema = z.object({
  name: requiredText('name').optional(),
  description: requiredText('description').optional(),
  createdBy: requiredText('createdBy').optional(),
  tags: TagsSchema.optional(),
});

export type UpdateModelInput = z.input<typeof UpdateModelInputSchema>;
export type ValidUpdateModelInput = z.output<typeof UpdateModelInputSchema>;

export const ArtifactUploadSchema = z.object({
  fileName: requiredText('fileName'),
  content: z.instanceof(Uint8Array, { message: 'content must be binary data' }),
});

export const ModelIdSchema = z.coerce.number().int().positive();

export const VersionNumberSchema = z.coerce.number().int().positive();

export const AliasNameSchema = requiredText('alias');
