import type { ArtifactStorePort } from '@modelvault/core';
import { ConfigurationError, STORAGE_METHODS } from '@modelvault/utils';
import { LocalArtifactStore } from './local-artifact-store.js';

export interface ArtifactStoreOptions {
  method: string;
  basePath: string;
}

/**
 * Pick the artifact backend named by MODEL_STORAGE_METHOD.
 */
export function createArtifactStore(options: ArtifactStoreOptions): ArtifactStorePort {
  switch (options.method) {
    case 'local':
      return new LocalArtifactStore(options.basePath);
    default:
      throw new ConfigurationError(
        `Unsupported storage method: ${options.method}`,
        'MODEL_STORAGE_METHOD',
        { supported: STORAGE_METHODS }
      );
  }
}
