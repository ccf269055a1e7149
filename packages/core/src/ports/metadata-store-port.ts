/**
 * Metadata Store Port
 *
 * Relational store for Model, Version and Alias rows. Implementations must
 * enforce, at commit time:
 * - unique model name key and storage key
 * - unique alias name (one global namespace) and at most one alias per version
 * - unique (modelId, versionNumber)
 * - cascade: Model → Versions → Alias
 *
 * A unique constraint violation surfaces as a ConflictError.
 */

import type {
  AliasRecord,
  ArtifactStatus,
  ModelChanges,
  ModelRecord,
  NewAlias,
  NewModel,
  NewVersion,
  VersionRecord,
  VersionWithAlias,
} from '../types/registry.js';

export interface MetadataRepository {
  listModels(): Promise<ModelRecord[]>;
  countModels(): Promise<number>;
  findModelById(modelId: number): Promise<ModelRecord | null>;

  /**
   * Find the model whose name key or storage key equals `key`. A name key
   * match wins over a storage key match.
   */
  findModelByKey(key: string): Promise<ModelRecord | null>;

  insertModel(model: NewModel): Promise<ModelRecord>;
  updateModel(modelId: number, changes: ModelChanges): Promise<ModelRecord>;

  /**
   * Delete the model and, by cascade, its versions and their aliases
   *
   * @returns whether a row was deleted
   */
  deleteModel(modelId: number): Promise<boolean>;

  /**
   * Versions of a model in ascending version number, alias attached
   */
  listVersions(modelId: number): Promise<VersionWithAlias[]>;
  findVersion(modelId: number, versionNumber: number): Promise<VersionWithAlias | null>;
  findVersionById(versionId: number): Promise<VersionWithAlias | null>;
  insertVersion(version: NewVersion): Promise<VersionRecord>;
  deleteVersion(versionId: number): Promise<boolean>;
  setArtifactStatus(versionId: number, status: ArtifactStatus, updatedAt: string): Promise<void>;

  findAliasByName(name: string): Promise<AliasRecord | null>;
  insertAlias(alias: NewAlias): Promise<AliasRecord>;
}

export interface MetadataStorePort extends MetadataRepository {
  /**
   * Run `work` inside one transaction. Committed when it resolves, rolled back
   * when it throws.
   */
  transaction<T>(work: (repo: MetadataRepository) => Promise<T>): Promise<T>;

  close(): Promise<void>;
}
