/**
 * Version routes
 */

import { createReadStream } from 'fs';
import { type FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ModelIdSchema, RegisterVersionInputSchema, VersionNumberSchema } from '@modelvault/core';
import { readRegistryUpload } from '../multipart.js';
import { logger } from '../logger.js';
import type { RegistryRouteOptions } from './types.js';

const ModelParamsSchema = z.object({ modelId: ModelIdSchema });

const VersionParamsSchema = z.object({
  modelId: ModelIdSchema,
  versionNumber: VersionNumberSchema,
});

const versionParams = {
  type: 'object',
  properties: {
    modelId: { type: 'integer', minimum: 1 },
    versionNumber: { type: 'integer', minimum: 1 },
  },
  required: ['modelId', 'versionNumber'],
} as const;

const PRINTABLE_ASCII = /^[\x20-\x7e]*$/;

/**
 * Header values must be latin-1; anything else is percent-encoded.
 */
function headerValue(value: string): string {
  return PRINTABLE_ASCII.test(value) ? value : encodeURIComponent(value);
}

export async function versionRoutes(fastify: FastifyInstance, { service }: RegistryRouteOptions) {
  /**
   * POST /models/:modelId/version
   * multipart/form-data with `model_file` and a JSON `metadata` field:
   * description, createdBy, tags?, metrics?, parameters?, alias?
   */
  fastify.post(
    '/models/:modelId/version',
    {
      schema: {
        description: 'Register a new version of a model',
        tags: ['versions'],
        consumes: ['multipart/form-data'],
        params: {
          type: 'object',
          properties: { modelId: { type: 'integer', minimum: 1 } },
          required: ['modelId'],
        },
      },
    },
    async (request, reply) => {
      const { modelId } = ModelParamsSchema.parse(request.params);
      const upload = await readRegistryUpload(request);
      const metadata = RegisterVersionInputSchema.parse(upload.metadata);

      const result = await service.registerVersion(modelId, metadata, upload.artifact);
      reply.status(201).send(result);
    }
  );

  /**
   * GET /models/:modelId/versions/:versionNumber
   */
  fastify.get(
    '/models/:modelId/versions/:versionNumber',
    { schema: { description: 'Get a model version', tags: ['versions'], params: versionParams } },
    async (request, reply) => {
      const { modelId, versionNumber } = VersionParamsSchema.parse(request.params);
      reply.status(200).send(await service.getVersion(modelId, versionNumber));
    }
  );

  /**
   * DELETE /models/:modelId/versions/:versionNumber
   */
  fastify.delete(
    '/models/:modelId/versions/:versionNumber',
    { schema: { description: 'Delete a model version', tags: ['versions'], params: versionParams } },
    async (request, reply) => {
      const { modelId, versionNumber } = VersionParamsSchema.parse(request.params);
      reply.status(200).send(await service.deleteVersion(modelId, versionNumber));
    }
  );

  /**
   * GET /models/:modelId/versions/:versionNumber/download
   * Streams the artifact. 404 ARTIFACT_MISSING when the metadata exists but
   * the artifact store holds no bytes for it.
   */
  fastify.get(
    '/models/:modelId/versions/:versionNumber/download',
    { schema: { description: 'Download a version artifact', tags: ['versions'], params: versionParams } },
    async (request, reply) => {
      const { modelId, versionNumber } = VersionParamsSchema.parse(request.params);
      const artifact = await service.downloadVersion(modelId, versionNumber);

      if (artifact.status === 'missing') {
        return reply.status(404).send({
          error: {
            message: `Artifact '${artifact.fileName}' of version ${versionNumber} of model '${artifact.modelName}' is missing from storage`,
            code: 'ARTIFACT_MISSING',
          },
        });
      }

      logger.debug('Streaming artifact', { modelId, versionNumber, filePath: artifact.filePath });

      return reply
        .status(200)
        .header('Content-Type', 'application/octet-stream')
        .header('Content-Disposition', `attachment; filename="${headerValue(artifact.fileName).replaceAll('"', '%22')}"`)
        .header('Model-Name', headerValue(artifact.modelName))
        .send(createReadStream(artifact.filePath));
    }
  );
}
