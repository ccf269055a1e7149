import type { z } from 'zod';
import type { VersionWithAlias } from '@modelvault/core';
import type { CommandContext } from '../../core/command-context.js';
import type { versionsShowSchema } from '../../command-defs/versions.js';

export type ShowVersionArgs = z.infer<typeof versionsShowSchema>;

export async function showVersionHandler(args: ShowVersionArgs, ctx: CommandContext): Promise<VersionWithAlias> {
  const registry = await ctx.registry();
  return registry.getVersion(args.modelId, args.versionNumber);
}
