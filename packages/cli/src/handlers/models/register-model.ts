/**
 * Register Model Handler
 *
 * Uploads a local file as version 1 of a new model.
 */

import type { z } from 'zod';
import { RegisterModelInputSchema, type RegisterModelResult } from '@modelvault/core';
import type { CommandContext } from '../../core/command-context.js';
import type { modelsRegisterSchema } from '../../command-defs/models.js';
import { coerceDocument, readArtifact } from '../../core/coerce.js';

export type RegisterModelArgs = z.infer<typeof modelsRegisterSchema>;

export async function registerModelHandler(
  args: RegisterModelArgs,
  ctx: CommandContext
): Promise<RegisterModelResult> {
  const metadata = coerceDocument(RegisterModelInputSchema, args.metadata, 'metadata');
  const artifact = await readArtifact(args.file);
  const registry = await ctx.registry();
  return registry.registerModel(metadata, artifact);
}
