/**
 * Model routes
 */

import { type FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ModelIdSchema, RegisterModelInputSchema, UpdateModelInputSchema } from '@modelvault/core';
import { readRegistryUpload } from '../multipart.js';
import type { RegistryRouteOptions } from './types.js';

const ModelParamsSchema = z.object({ modelId: ModelIdSchema });

const modelParams = {
  type: 'object',
  properties: { modelId: { type: 'integer', minimum: 1 } },
  required: ['modelId'],
} as const;

export async function modelRoutes(fastify: FastifyInstance, { service }: RegistryRouteOptions) {
  /**
   * GET /models
   * Every model with its versions and their aliases; [] when empty
   */
  fastify.get(
    '/models',
    { schema: { description: 'List models with their versions', tags: ['models'] } },
    async (request, reply) => {
      reply.status(200).send(await service.listModels());
    }
  );

  /**
   * POST /models
   * multipart/form-data with `model_file` and a JSON `metadata` field:
   * name, description, createdBy, tags?, versionDescription, versionMetrics?,
   * versionParameters?, versionTags?, versionAlias?
   */
  fastify.post(
    '/models',
    {
      schema: {
        description: 'Register a model with its first version',
        tags: ['models'],
        consumes: ['multipart/form-data'],
      },
    },
    async (request, reply) => {
      const upload = await readRegistryUpload(request);
      const metadata = RegisterModelInputSchema.parse(upload.metadata);

      const result = await service.registerModel(metadata, upload.artifact);
      reply.status(201).send(result);
    }
  );

  /**
   * GET /models/:modelId
   */
  fastify.get(
    '/models/:modelId',
    { schema: { description: 'Get a model with its versions', tags: ['models'], params: modelParams } },
    async (request, reply) => {
      const { modelId } = ModelParamsSchema.parse(request.params);
      reply.status(200).send(await service.getModel(modelId));
    }
  );

  /**
   * PUT /models/:modelId
   * JSON body; only the supplied fields (name, description, createdBy, tags) change
   */
  fastify.put(
    '/models/:modelId',
    { schema: { description: 'Update model metadata', tags: ['models'], params: modelParams } },
    async (request, reply) => {
      const { modelId } = ModelParamsSchema.parse(request.params);
      const patch = UpdateModelInputSchema.parse(request.body ?? {});

      reply.status(200).send(await service.updateModel(modelId, patch));
    }
  );

  /**
   * DELETE /models/:modelId
   * Removes the model, its versions, their aliases and their artifacts
   */
  fastify.delete(
    '/models/:modelId',
    { schema: { description: 'Delete a model and all its versions', tags: ['models'], params: modelParams } },
    async (request, reply) => {
      const { modelId } = ModelParamsSchema.parse(request.params);
      reply.status(200).send(await service.deleteModel(modelId));
    }
  );
}
