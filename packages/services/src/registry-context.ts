import {
  createSystemClock,
  type ArtifactStorePort,
  type ClockPort,
  type MetadataStorePort,
} from '@modelvault/core';
import type { EnvConfig } from '@modelvault/utils';
import { SqliteMetadataStore, createArtifactStore } from '@modelvault/storage';
import { ModelRegistryService } from './model-registry-service.js';
import { logger } from './logger.js';

export type RegistryConfig = Pick<EnvConfig, 'DATABASE_URL' | 'MODEL_STORAGE_PATH' | 'MODEL_STORAGE_METHOD'>;

export type RegistryPorts = {
  metadataStore: MetadataStorePort;
  artifactStore: ArtifactStorePort;
  clock: ClockPort;
};

export interface RegistryContext {
  service: ModelRegistryService;
  ports: RegistryPorts;
  close(): Promise<void>;
}

/**
 * Wire the registry engine to the configured metadata and artifact stores.
 * Callers own the returned context and must close it.
 */
export async function createRegistryContext(config: RegistryConfig): Promise<RegistryContext> {
  const artifactStore = createArtifactStore({
    method: config.MODEL_STORAGE_METHOD,
    basePath: config.MODEL_STORAGE_PATH,
  });
  const metadataStore = await SqliteMetadataStore.open(config.DATABASE_URL);

  const ports: RegistryPorts = {
    metadataStore,
    artifactStore,
    clock: createSystemClock(),
  };

  logger.debug('Registry context created', {
    storageMethod: config.MODEL_STORAGE_METHOD,
    storagePath: config.MODEL_STORAGE_PATH,
  });

  return {
    service: new ModelRegistryService(ports),
    ports,
    close: () => metadataStore.close(),
  };
}
