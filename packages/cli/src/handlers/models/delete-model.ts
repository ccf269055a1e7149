import type { z } from 'zod';
import type { DeleteModelResult } from '@modelvault/core';
import type { CommandContext } from '../../core/command-context.js';
import type { modelsDeleteSchema } from '../../command-defs/models.js';

export type DeleteModelArgs = z.infer<typeof modelsDeleteSchema>;

/**
 * Delete a model with all its versions, aliases and artifacts
 */
export async function deleteModelHandler(args: DeleteModelArgs, ctx: CommandContext): Promise<DeleteModelResult> {
  const registry = await ctx.registry();
  return registry.deleteModel(args.modelId);
}
