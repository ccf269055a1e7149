import type { z } from 'zod';
import { TagsSchema, type ModelWithVersions, type UpdateModelInput } from '@modelvault/core';
import type { CommandContext } from '../../core/command-context.js';
import type { modelsUpdateSchema } from '../../command-defs/models.js';
import { coerceDocument } from '../../core/coerce.js';

export type UpdateModelArgs = z.infer<typeof modelsUpdateSchema>;

export async function updateModelHandler(args: UpdateModelArgs, ctx: CommandContext): Promise<ModelWithVersions> {
  const patch: UpdateModelInput = {
    name: args.name,
    description: args.description,
    createdBy: args.createdBy,
  };
  if (args.tags !== undefined) {
    patch.tags = coerceDocument(TagsSchema, args.tags, 'tags');
  }

  const registry = await ctx.registry();
  return registry.updateModel(args.modelId, patch);
}
