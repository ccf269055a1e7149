import type { ModelRegistryService } from '@modelvault/services';

/**
 * Options every registry route plugin is registered with
 */
export interface RegistryRouteOptions {
  service: ModelRegistryService;
}
