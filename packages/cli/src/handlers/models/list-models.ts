/**
 * List Models Handler
 */

import type { z } from 'zod';
import type { CommandContext } from '../../core/command-context.js';
import type { modelsListSchema } from '../../command-defs/models.js';

export type ListModelsArgs = z.infer<typeof modelsListSchema>;

export interface ModelSummaryRow {
  modelId: number;
  name: string;
  versions: string;
  latestVersionNumber: number;
  createdBy: string;
  updatedAt: string;
}

export async function listModelsHandler(_args: ListModelsArgs, ctx: CommandContext): Promise<ModelSummaryRow[]> {
  const registry = await ctx.registry();
  const models = await registry.listModels();

  return models.map((model) => ({
    modelId: model.modelId,
    name: model.name,
    versions: model.versions.map((version) => version.versionNumber).join(','),
    latestVersionNumber: model.latestVersionNumber,
    createdBy: model.createdBy,
    updatedAt: model.updatedAt,
  }));
}
