import { type FastifyInstance } from 'fastify';
import { z } from 'zod';
import { AliasNameSchema } from '@modelvault/core';
import type { RegistryRouteOptions } from './types.js';

const AliasParamsSchema = z.object({ name: AliasNameSchema });

export async function aliasRoutes(fastify: FastifyInstance, { service }: RegistryRouteOptions) {
  /**
   * GET /aliases/:name
   * The model and version an alias points at
   */
  fastify.get(
    '/aliases/:name',
    { schema: { description: 'Resolve an alias', tags: ['aliases'] } },
    async (request, reply) => {
      const { name } = AliasParamsSchema.parse(request.params);
      reply.status(200).send(await service.resolveAlias(name));
    }
  );
}
