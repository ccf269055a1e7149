/**
 * Multipart upload parsing
 *
 * Registry uploads carry two parts: the artifact file (`model_file`) and a
 * `metadata` field holding a JSON document.
 */

import type { FastifyRequest } from 'fastify';
import type { ArtifactUpload } from '@modelvault/core';
import { ValidationError } from '@modelvault/utils';

export const FILE_FIELD = 'model_file';
export const METADATA_FIELD = 'metadata';

export interface RegistryUpload {
  metadata: unknown;
  artifact: ArtifactUpload;
}

function parseMetadata(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`${METADATA_FIELD} must be a JSON document`, {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}

export async function readRegistryUpload(request: FastifyRequest): Promise<RegistryUpload> {
  if (!request.isMultipart()) {
    throw new ValidationError('Request must be multipart/form-data');
  }

  let artifact: ArtifactUpload | null = null;
  let rawMetadata: string | null = null;

  for await (const part of request.parts()) {
    if (part.type === 'file') {
      const content = await part.toBuffer();
      if (part.fieldname === FILE_FIELD) {
        artifact = { fileName: part.filename, content };
      }
    } else if (part.fieldname === METADATA_FIELD) {
      if (typeof part.value !== 'string') {
        throw new ValidationError(`${METADATA_FIELD} must be a JSON string`);
      }
      rawMetadata = part.value;
    }
  }

  if (!artifact) {
    throw new ValidationError(`${FILE_FIELD} is required`);
  }
  if (rawMetadata === null) {
    throw new ValidationError(`${METADATA_FIELD} is required`);
  }

  return { metadata: parseMetadata(rawMetadata), artifact };
}
