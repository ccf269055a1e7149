import type { z } from 'zod';
import type { ModelWithVersions } from '@modelvault/core';
import type { CommandContext } from '../../core/command-context.js';
import type { modelsShowSchema } from '../../command-defs/models.js';

export type ShowModelArgs = z.infer<typeof modelsShowSchema>;

export async function showModelHandler(args: ShowModelArgs, ctx: CommandContext): Promise<ModelWithVersions> {
  const registry = await ctx.registry();
  return registry.getModel(args.modelId);
}
