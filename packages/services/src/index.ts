/**
 * @modelvault/services
 *
 * The registry engine and its composition root.
 */

export { ModelRegistryService } from './model-registry-service.js';
export type { ModelRegistryServiceDeps } from './model-registry-service.js';
export { createRegistryContext } from './registry-context.js';
export type { RegistryConfig, RegistryContext, RegistryPorts } from './registry-context.js';
