/**
 * Verify Artifacts Handler
 *
 * Checks every registered version against the artifact store and flattens the
 * report into one row per finding.
 */

import type { z } from 'zod';
import type { IntegrityReport } from '@modelvault/core';
import type { CommandContext } from '../../core/command-context.js';
import type { artifactsVerifySchema } from '../../command-defs/artifacts.js';

export type VerifyArtifactsArgs = z.infer<typeof artifactsVerifySchema>;

export interface IntegrityFindingRow {
  finding: 'missing' | 'unexpected';
  modelId: number;
  versionNumber: number;
  fileName: string;
}

export interface VerifyArtifactsResult {
  checked: number;
  stored: number;
  findings: IntegrityFindingRow[];
}

export function toFindingRows(report: IntegrityReport): IntegrityFindingRow[] {
  return [
    ...report.missing.map((entry) => ({
      finding: 'missing' as const,
      modelId: entry.modelId,
      versionNumber: entry.versionNumber,
      fileName: entry.fileName,
    })),
    ...report.unexpectedFiles.map((entry) => ({
      finding: 'unexpected' as const,
      modelId: entry.modelId,
      versionNumber: entry.versionNumber,
      fileName: entry.fileName,
    })),
  ];
}

export async function verifyArtifactsHandler(
  _args: VerifyArtifactsArgs,
  ctx: CommandContext
): Promise<VerifyArtifactsResult> {
  const registry = await ctx.registry();
  const report = await registry.verifyArtifacts();
  return { checked: report.checked, stored: report.stored, findings: toFindingRows(report) };
}
