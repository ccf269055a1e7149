/**
 * Value Coercion Helpers
 *
 * Turn raw command-line strings into the values the registry engine takes.
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import type { z } from 'zod';
import type { ArtifactUpload } from '@modelvault/core';
import { ValidationError } from '@modelvault/utils';

/**
 * Parse a JSON command-line value
 */
export function coerceJson(value: string, name: string): unknown {
  try {
    return JSON.parse(value);
  } catch (e) {
    const preview = value.length > 80 ? `${value.substring(0, 80)}...` : value;
    throw new ValidationError(`Invalid JSON for ${name}: ${e instanceof Error ? e.message : String(e)}`, {
      name,
      input: preview,
    });
  }
}

/**
 * Parse a JSON command-line value and check it against a schema
 */
export function coerceDocument<S extends z.ZodTypeAny>(schema: S, value: string, name: string): z.output<S> {
  const result = schema.safeParse(coerceJson(value, name));
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`Invalid ${name}: ${details}`, { name, issues: result.error.issues });
  }
  return result.data;
}

/**
 * Read an artifact from disk; the registry stores it under the file's base name
 */
export async function readArtifact(filePath: string): Promise<ArtifactUpload> {
  try {
    const content = await readFile(filePath);
    return { fileName: basename(filePath), content };
  } catch (e) {
    throw new ValidationError(`Cannot read artifact file ${filePath}: ${e instanceof Error ? e.message : String(e)}`, {
      file: filePath,
    });
  }
}
