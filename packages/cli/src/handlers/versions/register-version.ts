import type { z } from 'zod';
import { RegisterVersionInputSchema, type RegisterVersionResult } from '@modelvault/core';
import type { CommandContext } from '../../core/command-context.js';
import type { versionsRegisterSchema } from '../../command-defs/versions.js';
import { coerceDocument, readArtifact } from '../../core/coerce.js';

export type RegisterVersionArgs = z.infer<typeof versionsRegisterSchema>;

/**
 * Upload a local file as the next version of an existing model
 */
export async function registerVersionHandler(
  args: RegisterVersionArgs,
  ctx: CommandContext
): Promise<RegisterVersionResult> {
  const metadata = coerceDocument(RegisterVersionInputSchema, args.metadata, 'metadata');
  const artifact = await readArtifact(args.file);
  const registry = await ctx.registry();
  return registry.registerVersion(args.modelId, metadata, artifact);
}
