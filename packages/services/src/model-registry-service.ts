/**
 * Model Registry Service
 *
 * The registry engine. Keeps the metadata store (transactional) and the
 * artifact store (not transactional) consistent on a best-effort basis:
 *
 * - every check that can reject a request runs before the first write
 * - all relational writes of one operation share one transaction
 * - artifact calls run after the commit; a failed save leaves the version
 *   `pending`, a failed delete is reported once every delete was attempted
 */

import type { z } from 'zod';
import {
  AliasNameSchema,
  ArtifactUploadSchema,
  ModelIdSchema,
  RegisterModelInputSchema,
  RegisterVersionInputSchema,
  UpdateModelInputSchema,
  VersionNumberSchema,
  createSystemClock,
  isSafePathSegment,
  normalizeName,
  toIsoTimestamp,
  type AliasResolution,
  type ArtifactResolution,
  type ArtifactStorePort,
  type ArtifactUpload,
  type ClockPort,
  type DeleteModelResult,
  type DeleteVersionResult,
  type IntegrityReport,
  type MetadataRepository,
  type MetadataStorePort,
  type ModelChanges,
  type ModelRecord,
  type ModelWithVersions,
  type RegisterModelInput,
  type RegisterModelResult,
  type RegisterVersionInput,
  type RegisterVersionResult,
  type UpdateModelInput,
  type VersionRecord,
  type VersionWithAlias,
} from '@modelvault/core';
import { AppError, ConflictError, NotFoundError, StorageError, ValidationError } from '@modelvault/utils';
import { logger } from './logger.js';

export interface ModelRegistryServiceDeps {
  metadataStore: MetadataStorePort;
  artifactStore: ArtifactStorePort;
  clock?: ClockPort;
}

interface ArtifactDeleteFailure {
  versionNumber: number;
  fileName: string;
  error: string;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parse<S extends z.ZodTypeAny>(schema: S, value: unknown, subject: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`Invalid ${subject}: ${details}`, { issues: result.error.issues });
  }
  return result.data;
}

/**
 * Normalize a name into a storage key that is usable as one path segment.
 */
function storageSegment(raw: string, field: string): string {
  const key = normalizeName(raw);
  if (!isSafePathSegment(key)) {
    throw new ValidationError(`Invalid ${field}: '${raw}' cannot be used as a storage key`, { [field]: raw });
  }
  return key;
}

export class ModelRegistryService {
  private readonly metadataStore: MetadataStorePort;
  private readonly artifactStore: ArtifactStorePort;
  private readonly clock: ClockPort;

  constructor(deps: ModelRegistryServiceDeps) {
    this.metadataStore = deps.metadataStore;
    this.artifactStore = deps.artifactStore;
    this.clock = deps.clock ?? createSystemClock();
  }

  // ==========================================================================
  // Models
  // ==========================================================================

  async listModels(): Promise<ModelWithVersions[]> {
    const models = await this.metadataStore.listModels();
    return Promise.all(models.map((model) => this.withVersions(this.metadataStore, model)));
  }

  async getModel(modelId: number): Promise<ModelWithVersions> {
    const model = await this.requireModel(parse(ModelIdSchema, modelId, 'modelId'));
    return this.withVersions(this.metadataStore, model);
  }

  async countModels(): Promise<number> {
    return this.metadataStore.countModels();
  }

  /**
   * Create a model together with its first version and upload the artifact.
   */
  async registerModel(input: RegisterModelInput, artifact: ArtifactUpload): Promise<RegisterModelResult> {
    const data = parse(RegisterModelInputSchema, input, 'model metadata');
    const upload = parse(ArtifactUploadSchema, artifact, 'artifact');
    const nameKey = storageSegment(data.name, 'name');
    const fileName = storageSegment(upload.fileName, 'fileName');

    await this.assertNameFree(data.name, nameKey);
    if (data.versionAlias) {
      await this.assertAliasFree(data.versionAlias);
    }

    const now = this.now();
    const alias = data.versionAlias ?? null;
    const { model, version } = await this.metadataStore.transaction(async (repo) => {
      const model = await repo.insertModel({
        name: data.name,
        nameKey,
        storageKey: nameKey,
        description: data.description,
        createdBy: data.createdBy,
        tags: data.tags,
        latestVersionNumber: 1,
        createdAt: now,
        updatedAt: now,
      });
      const version = await repo.insertVersion({
        modelId: model.modelId,
        versionNumber: 1,
        description: data.versionDescription,
        createdBy: data.createdBy,
        tags: data.versionTags,
        metrics: data.versionMetrics,
        parameters: data.versionParameters,
        fileName,
        artifactStatus: 'pending',
        createdAt: now,
        updatedAt: now,
      });
      if (alias) {
        await repo.insertAlias({ name: alias, versionId: version.versionId, createdAt: now });
      }
      return { model, version };
    });

    await this.storeArtifact(model, version, upload.content);

    logger.info('Model registered', {
      modelId: model.modelId,
      name: model.name,
      fileName,
      alias,
    });

    return {
      modelId: model.modelId,
      name: model.name,
      versionNumber: version.versionNumber,
      message: `Model '${model.name}' registered with version 1`,
    };
  }

  /**
   * Patch a model's metadata. Renames change the display name and the name
   * key; artifacts stay under the storage key chosen at creation.
   */
  async updateModel(modelId: number, patch: UpdateModelInput): Promise<ModelWithVersions> {
    const id = parse(ModelIdSchema, modelId, 'modelId');
    const data = parse(UpdateModelInputSchema, patch, 'model metadata');
    const model = await this.requireModel(id);

    const changes: ModelChanges = { updatedAt: this.now() };
    if (data.name !== undefined) {
      const nameKey = storageSegment(data.name, 'name');
      await this.assertNameFree(data.name, nameKey, id);
      changes.name = data.name;
      changes.nameKey = nameKey;
    }
    if (data.description !== undefined) {
      changes.description = data.description;
    }
    if (data.createdBy !== undefined) {
      changes.createdBy = data.createdBy;
    }
    if (data.tags !== undefined) {
      changes.tags = data.tags;
    }

    const updated = await this.metadataStore.transaction(async (repo) => {
      const record = await repo.updateModel(id, changes);
      return this.withVersions(repo, record);
    });

    logger.info('Model updated', {
      modelId: id,
      fields: Object.keys(changes).filter((key) => key !== 'updatedAt'),
      previousName: model.name,
    });
    return updated;
  }

  /**
   * Delete a model, its versions and their aliases, then every artifact the
   * deleted versions owned.
   */
  async deleteModel(modelId: number): Promise<DeleteModelResult> {
    const id = parse(ModelIdSchema, modelId, 'modelId');
    const model = await this.requireModel(id);

    const versions = await this.metadataStore.transaction(async (repo) => {
      const versions = await repo.listVersions(id);
      await repo.deleteModel(id);
      return versions;
    });

    const failures: ArtifactDeleteFailure[] = [];
    for (const version of versions) {
      try {
        await this.artifactStore.delete(version.fileName, model.storageKey, version.versionNumber);
      } catch (error) {
        failures.push({
          versionNumber: version.versionNumber,
          fileName: version.fileName,
          error: describe(error),
        });
      }
    }

    const deletedVersions = versions.map((version) => version.versionNumber);

    if (failures.length > 0) {
      logger.error('Model deleted but artifacts remain', undefined, {
        modelId: id,
        storageKey: model.storageKey,
        failures,
      });
      throw new StorageError(
        `Model '${model.name}' was deleted but ${failures.length} artifact(s) could not be removed`,
        'delete',
        { modelId: id, storageKey: model.storageKey, failures }
      );
    }

    logger.info('Model deleted', { modelId: id, name: model.name, deletedVersions });

    return {
      modelId: id,
      name: model.name,
      deletedVersions,
      message: `Model '${model.name}' and ${versions.length} version(s) deleted`,
    };
  }

  // ==========================================================================
  // Versions
  // ==========================================================================

  /**
   * Append a version to an existing model and upload its artifact.
   */
  async registerVersion(
    modelId: number,
    input: RegisterVersionInput,
    artifact: ArtifactUpload
  ): Promise<RegisterVersionResult> {
    const id = parse(ModelIdSchema, modelId, 'modelId');
    const data = parse(RegisterVersionInputSchema, input, 'version metadata');
    const upload = parse(ArtifactUploadSchema, artifact, 'artifact');
    const fileName = storageSegment(upload.fileName, 'fileName');

    await this.requireModel(id);
    if (data.alias) {
      await this.assertAliasFree(data.alias);
    }

    const now = this.now();
    const alias = data.alias ?? null;
    const { model, version } = await this.metadataStore.transaction(async (repo) => {
      const current = await repo.findModelById(id);
      if (!current) {
        throw new NotFoundError('Model', id);
      }

      const versionNumber = current.latestVersionNumber + 1;
      const version = await repo.insertVersion({
        modelId: id,
        versionNumber,
        description: data.description,
        createdBy: data.createdBy,
        tags: data.tags,
        metrics: data.metrics,
        parameters: data.parameters,
        fileName,
        artifactStatus: 'pending',
        createdAt: now,
        updatedAt: now,
      });
      if (alias) {
        await repo.insertAlias({ name: alias, versionId: version.versionId, createdAt: now });
      }
      const model = await repo.updateModel(id, { latestVersionNumber: versionNumber, updatedAt: now });
      return { model, version };
    });

    await this.storeArtifact(model, version, upload.content);

    logger.info('Version registered', {
      modelId: id,
      versionNumber: version.versionNumber,
      versionId: version.versionId,
      alias,
    });

    return {
      modelId: id,
      versionNumber: version.versionNumber,
      versionId: version.versionId,
      message: `Version ${version.versionNumber} registered for model '${model.name}'`,
    };
  }

  async getVersion(modelId: number, versionNumber: number): Promise<VersionWithAlias> {
    const id = parse(ModelIdSchema, modelId, 'modelId');
    const number = parse(VersionNumberSchema, versionNumber, 'versionNumber');
    await this.requireModel(id);
    return this.requireVersion(id, number);
  }

  /**
   * Delete one version (its alias goes with it). The model's version counter
   * is left as it is, so numbers are never reused.
   */
  async deleteVersion(modelId: number, versionNumber: number): Promise<DeleteVersionResult> {
    const id = parse(ModelIdSchema, modelId, 'modelId');
    const number = parse(VersionNumberSchema, versionNumber, 'versionNumber');
    const model = await this.requireModel(id);
    const version = await this.requireVersion(id, number);

    await this.metadataStore.transaction(async (repo) => {
      await repo.deleteVersion(version.versionId);
    });

    let artifactRemoved: boolean;
    try {
      artifactRemoved = await this.artifactStore.delete(version.fileName, model.storageKey, number);
    } catch (error) {
      logger.error('Version deleted but its artifact remains', error, {
        modelId: id,
        versionNumber: number,
        storageKey: model.storageKey,
      });
      throw new StorageError(
        `Version ${number} of model '${model.name}' was deleted but its artifact could not be removed: ${describe(error)}`,
        'delete',
        { modelId: id, versionNumber: number, fileName: version.fileName }
      );
    }

    logger.info('Version deleted', { modelId: id, versionNumber: number, artifactRemoved });

    return {
      modelId: id,
      versionNumber: number,
      artifactRemoved,
      message: `Version ${number} of model '${model.name}' deleted`,
    };
  }

  /**
   * Locate a version's artifact bytes. Metadata without bytes is reported as
   * `missing`, not as NotFoundError.
   */
  async downloadVersion(modelId: number, versionNumber: number): Promise<ArtifactResolution> {
    const id = parse(ModelIdSchema, modelId, 'modelId');
    const number = parse(VersionNumberSchema, versionNumber, 'versionNumber');
    const model = await this.requireModel(id);
    const version = await this.requireVersion(id, number);

    const filePath = await this.artifactCall('resolve', { modelId: id, versionNumber: number }, () =>
      this.artifactStore.resolvePath(version.fileName, model.storageKey, number)
    );

    const base = {
      modelId: id,
      versionNumber: number,
      modelName: model.name,
      fileName: version.fileName,
    };

    if (filePath === null) {
      logger.warn('Artifact missing for registered version', {
        ...base,
        storageKey: model.storageKey,
        artifactStatus: version.artifactStatus,
      });
      return { status: 'missing', ...base };
    }
    return { status: 'available', ...base, filePath };
  }

  // ==========================================================================
  // Aliases
  // ==========================================================================

  async resolveAlias(name: string): Promise<AliasResolution> {
    const aliasName = parse(AliasNameSchema, name, 'alias');
    const alias = await this.metadataStore.findAliasByName(aliasName);
    if (!alias) {
      throw new NotFoundError('Alias', aliasName);
    }

    const version = await this.metadataStore.findVersionById(alias.versionId);
    const model = version ? await this.metadataStore.findModelById(version.modelId) : null;
    if (!version || !model) {
      throw new NotFoundError('Alias', aliasName, { versionId: alias.versionId });
    }

    return { alias: alias.name, modelId: model.modelId, modelName: model.name, version };
  }

  // ==========================================================================
  // Integrity
  // ==========================================================================

  /**
   * Compare every version row with the artifact store and record what was
   * found in `artifactStatus`.
   */
  async verifyArtifacts(): Promise<IntegrityReport> {
    const report: IntegrityReport = { checked: 0, stored: 0, missing: [], unexpectedFiles: [] };
    const models = await this.metadataStore.listModels();

    for (const model of models) {
      const versions = await this.metadataStore.listVersions(model.modelId);

      for (const version of versions) {
        const context = { modelId: model.modelId, versionNumber: version.versionNumber };
        const exists = await this.artifactCall('check', context, () =>
          this.artifactStore.checkExists(version.fileName, model.storageKey, version.versionNumber)
        );
        const files = await this.artifactCall('list', context, () =>
          this.artifactStore.listFiles(model.storageKey, version.versionNumber)
        );

        report.checked += 1;
        const status = exists ? 'stored' : 'missing';
        if (status !== version.artifactStatus) {
          await this.metadataStore.setArtifactStatus(version.versionId, status, this.now());
        }

        if (exists) {
          report.stored += 1;
        } else {
          report.missing.push({
            modelId: model.modelId,
            modelName: model.name,
            versionNumber: version.versionNumber,
            fileName: version.fileName,
            previousStatus: version.artifactStatus,
          });
        }

        for (const file of files) {
          if (file !== version.fileName) {
            report.unexpectedFiles.push({ ...context, fileName: file });
          }
        }
      }
    }

    const level = report.missing.length > 0 ? 'warn' : 'info';
    logger[level]('Artifact verification finished', {
      checked: report.checked,
      stored: report.stored,
      missing: report.missing.length,
      unexpectedFiles: report.unexpectedFiles.length,
    });

    return report;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private now(): string {
    return toIsoTimestamp(this.clock.nowMs());
  }

  private async requireModel(modelId: number): Promise<ModelRecord> {
    const model = await this.metadataStore.findModelById(modelId);
    if (!model) {
      throw new NotFoundError('Model', modelId);
    }
    return model;
  }

  private async requireVersion(modelId: number, versionNumber: number): Promise<VersionWithAlias> {
    const version = await this.metadataStore.findVersion(modelId, versionNumber);
    if (!version) {
      throw new NotFoundError('Version', versionNumber, { modelId });
    }
    return version;
  }

  private async withVersions(repo: MetadataRepository, model: ModelRecord): Promise<ModelWithVersions> {
    return { ...model, versions: await repo.listVersions(model.modelId) };
  }

  /**
   * A name is taken when another model has the same name key, or when its key
   * equals the storage key a renamed model kept.
   */
  private async assertNameFree(name: string, nameKey: string, exceptModelId?: number): Promise<void> {
    const holder = await this.metadataStore.findModelByKey(nameKey);
    if (!holder || holder.modelId === exceptModelId) {
      return;
    }
    if (holder.nameKey === nameKey) {
      throw new ConflictError(`Model '${name}' already exists`, { name, modelId: holder.modelId });
    }
    throw new ConflictError(
      `Storage key '${nameKey}' of '${name}' is held by model ${holder.modelId} ('${holder.name}')`,
      { name, storageKey: nameKey, modelId: holder.modelId }
    );
  }

  private async assertAliasFree(alias: string): Promise<void> {
    const existing = await this.metadataStore.findAliasByName(alias);
    if (existing) {
      throw new ConflictError(`Alias '${alias}' already exists`, {
        alias,
        versionId: existing.versionId,
      });
    }
  }

  /**
   * Save a freshly committed version's bytes and mark it stored. On failure
   * the version stays `pending` and the caller gets a StorageError.
   */
  private async storeArtifact(model: ModelRecord, version: VersionRecord, content: Uint8Array): Promise<void> {
    const context = {
      modelId: model.modelId,
      versionNumber: version.versionNumber,
      storageKey: model.storageKey,
      fileName: version.fileName,
    };

    let saved: boolean;
    try {
      saved = await this.artifactStore.save(
        version.fileName,
        model.storageKey,
        version.versionNumber,
        content
      );
    } catch (error) {
      logger.error('Artifact save failed; version left pending', error, context);
      throw new StorageError(
        `Metadata for version ${version.versionNumber} of model '${model.name}' was recorded but its artifact could not be stored: ${describe(error)}`,
        'save',
        context
      );
    }

    if (!saved) {
      logger.error('Artifact store declined the save; version left pending', undefined, context);
      throw new StorageError(
        `Metadata for version ${version.versionNumber} of model '${model.name}' was recorded but its artifact could not be stored`,
        'save',
        context
      );
    }

    await this.metadataStore.setArtifactStatus(version.versionId, 'stored', this.now());
  }

  private async artifactCall<T>(
    operation: string,
    context: Record<string, unknown>,
    call: () => Promise<T>
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new StorageError(`Artifact store ${operation} failed: ${describe(error)}`, operation, context);
    }
  }
}
