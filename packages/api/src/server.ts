/**
 * Fastify API Server
 */

import Fastify, { type FastifyError, type FastifyInstance, type FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { ZodError } from 'zod';
import { AppError, LogHelpers, getLogLevel, handleError } from '@modelvault/utils';
import type { ModelRegistryService } from '@modelvault/services';
import { logger } from './logger.js';
import { healthRoutes } from './routes/health.js';
import { modelRoutes } from './routes/models.js';
import { versionRoutes } from './routes/versions.js';
import { aliasRoutes } from './routes/aliases.js';

export interface ApiServerConfig {
  service: ModelRegistryService;
  port?: number;
  host?: string;
  enableSwagger?: boolean;
  corsOrigin?: string | string[];
  /** Largest accepted artifact upload, in bytes */
  maxUploadBytes?: number;
  /** Fastify's own request logging */
  requestLogging?: boolean;
}

export interface ErrorBody {
  error: {
    message: string;
    code: string;
  };
}

const DEFAULT_MAX_UPLOAD_BYTES = 1024 * 1024 * 1024;

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Map any error reaching the HTTP layer to a status code and error body
 */
export function toErrorResponse(
  error: FastifyError | Error,
  request: FastifyRequest
): { statusCode: number; body: ErrorBody } {
  const context = { method: request.method, url: request.url };

  if (error instanceof ZodError) {
    const message = `Invalid request: ${formatZodError(error)}`;
    logger.warn('Request validation failed', { ...context, issues: error.issues });
    return { statusCode: 422, body: { error: { message, code: 'VALIDATION_ERROR' } } };
  }

  if ('validation' in error && error.validation) {
    logger.warn('Request validation failed', { ...context, message: error.message });
    return { statusCode: 422, body: { error: { message: error.message, code: 'VALIDATION_ERROR' } } };
  }

  // Errors fastify and its plugins raise for malformed requests (oversized upload, bad JSON)
  if (
    !(error instanceof AppError) &&
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    error.statusCode < 500
  ) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : 'BAD_REQUEST';
    logger.warn('Request rejected', { ...context, statusCode: error.statusCode, code });
    return { statusCode: error.statusCode, body: { error: { message: error.message, code } } };
  }

  const result = handleError(error, context);
  return { statusCode: result.statusCode, body: { error: { message: result.message, code: result.code } } };
}

/**
 * Create and configure Fastify API server
 */
export async function createApiServer(config: ApiServerConfig): Promise<FastifyInstance> {
  const {
    service,
    port = 8000,
    host = '0.0.0.0',
    enableSwagger = process.env.NODE_ENV !== 'production',
    corsOrigin = '*',
    maxUploadBytes = DEFAULT_MAX_UPLOAD_BYTES,
    requestLogging = process.env.NODE_ENV === 'development',
  } = config;

  const server = Fastify({
    logger: requestLogging,
  });

  // Error handler (routes pick it up when they are declared)
  server.setErrorHandler((error, request, reply) => {
    const { statusCode, body } = toErrorResponse(error, request);
    reply.status(statusCode).send(body);
  });

  // CORS
  await server.register(cors, {
    origin: corsOrigin,
  });

  // Artifact uploads
  await server.register(multipart, {
    limits: {
      fileSize: maxUploadBytes,
      files: 1,
    },
  });

  // Swagger/OpenAPI documentation
  if (enableSwagger) {
    await server.register(swagger, {
      openapi: {
        info: {
          title: 'modelvault API',
          description: 'Registry of versioned machine-learning model artifacts',
          version: '0.1.0',
        },
        servers: [
          {
            url: `http://${host}:${port}`,
            description: 'Development server',
          },
        ],
      },
    });

    await server.register(swaggerUi, {
      routePrefix: '/docs',
      uiConfig: {
        docExpansion: 'list',
        deepLinking: false,
      },
    });
  }

  const startedAt = new WeakMap<FastifyRequest, number>();
  server.addHook('onRequest', async (request) => {
    startedAt.set(request, performance.now());
  });
  server.addHook('onResponse', async (request, reply) => {
    const started = startedAt.get(request) ?? performance.now();
    const duration = Math.round(performance.now() - started);
    LogHelpers.apiResponse(logger, request.method, request.url, reply.statusCode, duration);
  });

  // Routes
  await server.register(healthRoutes, { service });
  await server.register(modelRoutes, { service });
  await server.register(versionRoutes, { service });
  await server.register(aliasRoutes, { service });

  return server;
}

/**
 * Start listening
 */
export async function startApiServer(
  server: FastifyInstance,
  options: { port: number; host: string }
): Promise<string> {
  const address = await server.listen({ port: options.port, host: options.host });
  logger.info('API server started', { address, logLevel: getLogLevel() });
  return address;
}
