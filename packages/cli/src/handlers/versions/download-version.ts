/**
 * Download Version Handler
 *
 * Copies a version's artifact out of the store to a local path.
 */

import { copyFile } from 'fs/promises';
import { resolve } from 'path';
import type { z } from 'zod';
import { AppError } from '@modelvault/utils';
import type { CommandContext } from '../../core/command-context.js';
import type { versionsDownloadSchema } from '../../command-defs/versions.js';

export type DownloadVersionArgs = z.infer<typeof versionsDownloadSchema>;

export interface DownloadVersionResult {
  modelId: number;
  modelName: string;
  versionNumber: number;
  fileName: string;
  savedTo: string;
}

export async function downloadVersionHandler(
  args: DownloadVersionArgs,
  ctx: CommandContext
): Promise<DownloadVersionResult> {
  const registry = await ctx.registry();
  const artifact = await registry.downloadVersion(args.modelId, args.versionNumber);

  if (artifact.status === 'missing') {
    throw new AppError(
      `Artifact '${artifact.fileName}' of version ${artifact.versionNumber} of model '${artifact.modelName}' is missing from storage`,
      'ARTIFACT_MISSING',
      404,
      { modelId: artifact.modelId, versionNumber: artifact.versionNumber }
    );
  }

  const destination = resolve(args.out ?? artifact.fileName);
  await copyFile(artifact.filePath, destination);

  return {
    modelId: artifact.modelId,
    modelName: artifact.modelName,
    versionNumber: artifact.versionNumber,
    fileName: artifact.fileName,
    savedTo: destination,
  };
}
