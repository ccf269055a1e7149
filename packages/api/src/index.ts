/**
 * @modelvault/api
 *
 * REST API for the model registry using Fastify
 *
 * Endpoints:
 * - GET /health - CPU, memory and model count
 * - GET|POST /models - List models, register a model (multipart)
 * - GET|PUT|DELETE /models/:modelId
 * - POST /models/:modelId/version - Register a version (multipart)
 * - GET|DELETE /models/:modelId/versions/:versionNumber
 * - GET /models/:modelId/versions/:versionNumber/download
 * - GET /aliases/:name
 */

export { createApiServer, startApiServer, toErrorResponse } from './server.js';
export type { ApiServerConfig, ErrorBody } from './server.js';
export { readRegistryUpload, FILE_FIELD, METADATA_FIELD } from './multipart.js';
export type { RegistryUpload } from './multipart.js';
