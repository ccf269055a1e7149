/**
 * Command Context - Lazy service creation
 *
 * Commands ask the context for the registry engine; the stores behind it are
 * opened on first use and closed once the command has finished.
 */

import { loadConfig, type EnvConfig } from '@modelvault/utils';
import {
  createRegistryContext,
  type ModelRegistryService,
  type RegistryContext,
} from '@modelvault/services';

/**
 * Options for creating a CommandContext with service overrides
 */
export interface CommandContextOptions {
  /** Configuration to use instead of the environment */
  config?: EnvConfig;
  /** Registry engine to use instead of one built from configuration (tests) */
  registryOverride?: ModelRegistryService;
}

export class CommandContext {
  private registryContext: RegistryContext | null = null;
  private readonly options: CommandContextOptions;

  constructor(options: CommandContextOptions = {}) {
    this.options = options;
  }

  config(): EnvConfig {
    return this.options.config ?? loadConfig();
  }

  async registry(): Promise<ModelRegistryService> {
    if (this.options.registryOverride) {
      return this.options.registryOverride;
    }
    if (!this.registryContext) {
      this.registryContext = await createRegistryContext(this.config());
    }
    return this.registryContext.service;
  }

  /**
   * Close whatever the context opened. Overrides belong to the caller.
   */
  async close(): Promise<void> {
    if (this.registryContext) {
      const context = this.registryContext;
      this.registryContext = null;
      await context.close();
    }
  }
}
