import type { z } from 'zod';
import type { AliasResolution } from '@modelvault/core';
import type { CommandContext } from '../../core/command-context.js';
import type { aliasesResolveSchema } from '../../command-defs/aliases.js';

export type ResolveAliasArgs = z.infer<typeof aliasesResolveSchema>;

export async function resolveAliasHandler(args: ResolveAliasArgs, ctx: CommandContext): Promise<AliasResolution> {
  const registry = await ctx.registry();
  return registry.resolveAlias(args.name);
}
