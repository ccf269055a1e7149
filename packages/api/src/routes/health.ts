/**
 * Health check routes
 */

import { type FastifyInstance } from 'fastify';
import { sampleCpuUsage, sampleMemoryUsage } from '../system-metrics.js';
import type { RegistryRouteOptions } from './types.js';

export async function healthRoutes(fastify: FastifyInstance, { service }: RegistryRouteOptions) {
  /**
   * GET /
   * Greeting
   */
  fastify.get('/', { schema: { hide: true } }, async () => ({ message: 'Hello World' }));

  /**
   * GET /health
   * CPU and memory usage of the host (percent) and the number of registered models
   */
  fastify.get(
    '/health',
    {
      schema: {
        description: 'Server health and registry size',
        tags: ['health'],
        response: {
          200: {
            type: 'object',
            properties: {
              cpuUsage: { type: 'number' },
              memoryUsage: { type: 'number' },
              numberOfModels: { type: 'integer' },
            },
          },
        },
      },
    },
    async (request, reply) => {
      const numberOfModels = await service.countModels();

      reply.status(200).send({
        cpuUsage: sampleCpuUsage(),
        memoryUsage: sampleMemoryUsage(),
        numberOfModels,
      });
    }
  );
}
