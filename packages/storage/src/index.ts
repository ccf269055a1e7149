/**
 * @modelvault/storage
 *
 * Adapters behind the registry ports:
 * - SqliteMetadataStore (MetadataStorePort) for models, versions and aliases
 * - LocalArtifactStore (ArtifactStorePort) for artifact bytes on disk
 */

export { SqliteMetadataRepository, SqliteMetadataStore } from './metadata/sqlite-metadata-store.js';
export { SqliteClient, toStoreError } from './sqlite/sqlite-client.js';
export type { SqlExecutor, SqlValue, SqlParams, SqlRunResult } from './sqlite/sqlite-client.js';
export { IN_MEMORY, resolveSqliteFilename } from './sqlite/database-url.js';
export { MIGRATIONS, migrate, getCurrentSchemaVersion } from './migrations/schema.js';
export type { SchemaMigration } from './migrations/schema.js';

export { LocalArtifactStore } from './artifacts/local-artifact-store.js';
export { createArtifactStore } from './artifacts/artifact-store-factory.js';
export type { ArtifactStoreOptions } from './artifacts/artifact-store-factory.js';
