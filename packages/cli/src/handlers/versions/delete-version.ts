import type { z } from 'zod';
import type { DeleteVersionResult } from '@modelvault/core';
import type { CommandContext } from '../../core/command-context.js';
import type { versionsDeleteSchema } from '../../command-defs/versions.js';

export type DeleteVersionArgs = z.infer<typeof versionsDeleteSchema>;

export async function deleteVersionHandler(args: DeleteVersionArgs, ctx: CommandContext): Promise<DeleteVersionResult> {
  const registry = await ctx.registry();
  return registry.deleteVersion(args.modelId, args.versionNumber);
}
