import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { ArtifactUpload, ModelWithVersions, RegisterModelInput, RegisterVersionInput } from '@modelvault/core';
import { ConflictError, NotFoundError, StorageError, ValidationError } from '@modelvault/utils';
import { SqliteMetadataStore } from '@modelvault/storage';
import { ModelRegistryService } from '../../src/model-registry-service.js';
import { InMemoryArtifactStore } from '../helpers/in-memory-artifact-store.js';

const NOW_MS = Date.UTC(2026, 0, 15, 10, 0, 0);
const NOW = '2026-01-15T10:00:00.000Z';

const artifact = (fileName = 'weights.bin', text = 'bytes'): ArtifactUpload => ({
  fileName,
  content: new TextEncoder().encode(text),
});

const modelInput = (overrides: Partial<RegisterModelInput> = {}): RegisterModelInput => ({
  name: 'Resnet 50',
  description: 'image classifier',
  createdBy: 'alice',
  tags: { team: 'vision' },
  versionDescription: 'first cut',
  versionMetrics: { accuracy: 0.9 },
  ...overrides,
});

const versionInput = (overrides: Partial<RegisterVersionInput> = {}): RegisterVersionInput => ({
  description: 'retrained',
  createdBy: 'bob',
  ...overrides,
});

describe('ModelRegistryService', () => {
  let metadataStore: SqliteMetadataStore;
  let artifactStore: InMemoryArtifactStore;
  let service: ModelRegistryService;

  beforeEach(async () => {
    metadataStore = await SqliteMetadataStore.open(':memory:');
    artifactStore = new InMemoryArtifactStore();
    service = new ModelRegistryService({
      metadataStore,
      artifactStore,
      clock: { nowMs: () => NOW_MS },
    });
  });

  afterEach(async () => {
    await metadataStore.close();
  });

  describe('registerModel', () => {
    it('creates the model, version 1 and the artifact', async () => {
      const result = await service.registerModel(modelInput({ versionAlias: 'prod' }), artifact('My Weights.bin'));

      expect(result).toEqual({
        modelId: 1,
        name: 'Resnet 50',
        versionNumber: 1,
        message: "Model 'Resnet 50' registered with version 1",
      });
      expect([...artifactStore.files.keys()]).toEqual(['resnet_50/1/my_weights.bin']);

      const model = await service.getModel(1);
      expect(model.name).toBe('Resnet 50');
      expect(model.nameKey).toBe('resnet_50');
      expect(model.storageKey).toBe('resnet_50');
      expect(model.latestVersionNumber).toBe(1);
      expect(model.createdAt).toBe(NOW);
      expect(model.versions).toHaveLength(1);
      expect(model.versions[0]).toMatchObject({
        versionNumber: 1,
        description: 'first cut',
        createdBy: 'alice',
        metrics: { accuracy: 0.9 },
        parameters: {},
        tags: {},
        fileName: 'my_weights.bin',
        artifactStatus: 'stored',
      });
      expect(model.versions[0]?.alias?.name).toBe('prod');
    });

    it('rejects a name that normalizes to an existing model', async () => {
      await service.registerModel(modelInput(), artifact());

      await expect(service.registerModel(modelInput({ name: 'RESNET_50' }), artifact())).rejects.toThrow(
        ConflictError
      );
      await expect(service.countModels()).resolves.toBe(1);
    });

    it('rejects a taken alias before writing anything', async () => {
      await service.registerModel(modelInput({ versionAlias: 'prod' }), artifact());

      await expect(
        service.registerModel(modelInput({ name: 'Other', versionAlias: 'prod' }), artifact())
      ).rejects.toThrow("Alias 'prod' already exists");

      await expect(service.countModels()).resolves.toBe(1);
      expect(artifactStore.calls.filter((call) => call.operation === 'save')).toHaveLength(1);
    });

    it('rejects missing or empty required metadata', async () => {
      await expect(service.registerModel(modelInput({ name: '' }), artifact())).rejects.toThrow(ValidationError);
      await expect(service.registerModel(modelInput({ description: '   ' }), artifact())).rejects.toThrow(
        'description must not be blank'
      );
      await expect(service.registerModel(modelInput(), artifact(''))).rejects.toThrow(ValidationError);
      await expect(service.countModels()).resolves.toBe(0);
    });

    it('rejects names that cannot be a storage key', async () => {
      await expect(service.registerModel(modelInput({ name: '../etc' }), artifact())).rejects.toThrow(
        "Invalid name: '../etc' cannot be used as a storage key"
      );
    });

    it('keeps metadata pending when the artifact save fails', async () => {
      artifactStore.failOn('save');

      const attempt = service.registerModel(modelInput(), artifact());

      await expect(attempt).rejects.toThrow(StorageError);
      const model = await service.getModel(1);
      expect(model.versions[0]?.artifactStatus).toBe('pending');
    });

    it('names the model that kept a storage key when a new name collides with it', async () => {
      await service.registerModel(modelInput(), artifact());
      await service.updateModel(1, { name: 'Resnet Prime' });

      await expect(service.registerModel(modelInput({ name: 'resnet 50' }), artifact())).rejects.toThrow(
        "Storage key 'resnet_50' of 'resnet 50' is held by model 1 ('Resnet Prime')"
      );
    });
  });

  describe('registerVersion', () => {
    beforeEach(async () => {
      await service.registerModel(modelInput({ versionAlias: 'prod' }), artifact());
    });

    it('assigns the next version number and bumps the counter', async () => {
      const result = await service.registerVersion(1, versionInput({ alias: 'staging' }), artifact('v2.bin'));

      expect(result.modelId).toBe(1);
      expect(result.versionNumber).toBe(2);
      expect(result.message).toBe("Version 2 registered for model 'Resnet 50'");

      const model = await service.getModel(1);
      expect(model.latestVersionNumber).toBe(2);
      expect(model.versions.map((v) => v.versionNumber)).toEqual([1, 2]);
      expect(model.versions[1]?.alias?.name).toBe('staging');
      expect(artifactStore.files.has('resnet_50/2/v2.bin')).toBe(true);
    });

    it('fails for an unknown model', async () => {
      await expect(service.registerVersion(99, versionInput(), artifact())).rejects.toThrow(
        "Model with identifier '99' not found"
      );
    });

    it('leaves no version behind when the alias is taken', async () => {
      await expect(service.registerVersion(1, versionInput({ alias: 'prod' }), artifact())).rejects.toThrow(
        ConflictError
      );

      const model = await service.getModel(1);
      expect(model.latestVersionNumber).toBe(1);
      expect(model.versions).toHaveLength(1);
      expect(artifactStore.files.size).toBe(1);
    });

    it('never reuses the number of a deleted version', async () => {
      await service.registerVersion(1, versionInput(), artifact());
      await service.deleteVersion(1, 2);

      const result = await service.registerVersion(1, versionInput(), artifact());

      expect(result.versionNumber).toBe(3);
    });

    it('keeps the version pending when the artifact save fails', async () => {
      artifactStore.failOn('save', 2);

      await expect(service.registerVersion(1, versionInput(), artifact())).rejects.toThrow(
        "Metadata for version 2 of model 'Resnet 50' was recorded but its artifact could not be stored"
      );

      const version = await service.getVersion(1, 2);
      expect(version.artifactStatus).toBe('pending');
    });
  });

  describe('updateModel', () => {
    it('patches only the supplied fields', async () => {
      await service.registerModel(modelInput(), artifact());

      const updated = await service.updateModel(1, { description: 'new description' });

      expect(updated.description).toBe('new description');
      expect(updated.name).toBe('Resnet 50');
      expect(updated.tags).toEqual({ team: 'vision' });
      expect(updated.versions).toHaveLength(1);
    });

    it('renames without moving artifacts', async () => {
      await service.registerModel(modelInput(), artifact());

      const updated = await service.updateModel(1, { name: 'Resnet Prime' });
      const download = await service.downloadVersion(1, 1);

      expect(updated.name).toBe('Resnet Prime');
      expect(updated.nameKey).toBe('resnet_prime');
      expect(updated.storageKey).toBe('resnet_50');
      expect(download).toEqual({
        status: 'available',
        modelId: 1,
        versionNumber: 1,
        modelName: 'Resnet Prime',
        fileName: 'weights.bin',
        filePath: 'memory://resnet_50/1/weights.bin',
      });
    });

    it('rejects a rename onto another model', async () => {
      await service.registerModel(modelInput(), artifact());
      await service.registerModel(modelInput({ name: 'Bert' }), artifact());

      await expect(service.updateModel(2, { name: 'resnet 50' })).rejects.toThrow(ConflictError);
    });

    it('fails for an unknown model', async () => {
      await expect(service.updateModel(5, { description: 'x' })).rejects.toThrow(NotFoundError);
    });
  });

  describe('deleteModel', () => {
    it('removes metadata and the artifacts of the versions that exist', async () => {
      await service.registerModel(modelInput({ versionAlias: 'prod' }), artifact());
      await service.registerVersion(1, versionInput(), artifact());
      await service.registerVersion(1, versionInput(), artifact());
      await service.deleteVersion(1, 2);
      artifactStore.calls.length = 0;

      const result = await service.deleteModel(1);

      expect(result).toEqual({
        modelId: 1,
        name: 'Resnet 50',
        deletedVersions: [1, 3],
        message: "Model 'Resnet 50' and 2 version(s) deleted",
      });
      expect(artifactStore.calls).toEqual([
        { operation: 'delete', modelKey: 'resnet_50', versionNumber: 1 },
        { operation: 'delete', modelKey: 'resnet_50', versionNumber: 3 },
      ]);
      expect(artifactStore.files.size).toBe(0);
      await expect(service.resolveAlias('prod')).rejects.toThrow(NotFoundError);
      await expect(service.getModel(1)).rejects.toThrow(NotFoundError);
    });

    it('attempts every artifact delete and then reports the failures', async () => {
      await service.registerModel(modelInput(), artifact());
      await service.registerVersion(1, versionInput(), artifact());
      artifactStore.failOn('delete', 1);

      await expect(service.deleteModel(1)).rejects.toThrow(
        "Model 'Resnet 50' was deleted but 1 artifact(s) could not be removed"
      );

      await expect(service.countModels()).resolves.toBe(0);
      expect(artifactStore.files.has('resnet_50/1/weights.bin')).toBe(true);
      expect(artifactStore.files.has('resnet_50/2/weights.bin')).toBe(false);
    });

    it('frees the name for a new model', async () => {
      await service.registerModel(modelInput(), artifact());
      await service.deleteModel(1);

      const result = await service.registerModel(modelInput(), artifact());

      expect(result.modelId).toBe(2);
    });
  });

  describe('versions', () => {
    beforeEach(async () => {
      await service.registerModel(modelInput(), artifact());
      await service.registerVersion(1, versionInput({ alias: 'canary' }), artifact());
    });

    it('reads a version with its alias', async () => {
      const version = await service.getVersion(1, 2);

      expect(version.versionNumber).toBe(2);
      expect(version.createdBy).toBe('bob');
      expect(version.alias?.name).toBe('canary');
    });

    it('reports unknown versions as not found', async () => {
      await expect(service.getVersion(1, 7)).rejects.toThrow("Version with identifier '7' not found");
      await expect(service.downloadVersion(1, 7)).rejects.toThrow(NotFoundError);
      await expect(service.deleteVersion(1, 7)).rejects.toThrow(NotFoundError);
    });

    it('frees the alias of a deleted version', async () => {
      const result = await service.deleteVersion(1, 2);

      expect(result).toEqual({
        modelId: 1,
        versionNumber: 2,
        artifactRemoved: true,
        message: "Version 2 of model 'Resnet 50' deleted",
      });
      await expect(service.registerVersion(1, versionInput({ alias: 'canary' }), artifact())).resolves.toMatchObject(
        { versionNumber: 3 }
      );
    });

    it('keeps the later version, its alias and the counter when version 1 is deleted', async () => {
      await service.deleteVersion(1, 1);

      const models = await service.listModels();

      expect(models).toHaveLength(1);
      expect(models[0]?.latestVersionNumber).toBe(2);
      expect(models[0]?.versions.map((v) => [v.versionNumber, v.alias?.name])).toEqual([[2, 'canary']]);
      expect([...artifactStore.files.keys()]).toEqual(['resnet_50/2/weights.bin']);
    });

    it('reports a missing artifact distinctly from missing metadata', async () => {
      artifactStore.files.delete('resnet_50/2/weights.bin');

      const download = await service.downloadVersion(1, 2);

      expect(download).toEqual({
        status: 'missing',
        modelId: 1,
        versionNumber: 2,
        modelName: 'Resnet 50',
        fileName: 'weights.bin',
      });
    });

    it('rejects non-positive version numbers', async () => {
      await expect(service.getVersion(1, 0)).rejects.toThrow(ValidationError);
    });
  });

  describe('resolveAlias', () => {
    it('resolves an alias to its model and version', async () => {
      await service.registerModel(modelInput(), artifact());
      await service.registerVersion(1, versionInput({ alias: 'prod' }), artifact());

      const resolution = await service.resolveAlias('prod');

      expect(resolution.alias).toBe('prod');
      expect(resolution.modelId).toBe(1);
      expect(resolution.modelName).toBe('Resnet 50');
      expect(resolution.version.versionNumber).toBe(2);
    });

    it('fails for unknown aliases', async () => {
      await expect(service.resolveAlias('nope')).rejects.toThrow("Alias with identifier 'nope' not found");
    });
  });

  describe('verifyArtifacts', () => {
    it('records missing artifacts and reports stray files', async () => {
      await service.registerModel(modelInput(), artifact());
      await service.registerVersion(1, versionInput(), artifact());
      artifactStore.files.delete('resnet_50/1/weights.bin');
      artifactStore.files.set('resnet_50/2/notes.txt', new Uint8Array());

      const report = await service.verifyArtifacts();

      expect(report).toEqual({
        checked: 2,
        stored: 1,
        missing: [
          {
            modelId: 1,
            modelName: 'Resnet 50',
            versionNumber: 1,
            fileName: 'weights.bin',
            previousStatus: 'stored',
          },
        ],
        unexpectedFiles: [{ modelId: 1, versionNumber: 2, fileName: 'notes.txt' }],
      });
      await expect(service.getVersion(1, 1)).resolves.toMatchObject({ artifactStatus: 'missing' });
    });

    it('marks pending versions stored once their bytes are present', async () => {
      artifactStore.failOn('save');
      await expect(service.registerModel(modelInput(), artifact())).rejects.toThrow(StorageError);
      artifactStore.files.set('resnet_50/1/weights.bin', new Uint8Array([1]));

      const report = await service.verifyArtifacts();

      expect(report.stored).toBe(1);
      await expect(service.getVersion(1, 1)).resolves.toMatchObject({ artifactStatus: 'stored' });
    });

    it('returns an empty report for an empty registry', async () => {
      await expect(service.verifyArtifacts()).resolves.toEqual({
        checked: 0,
        stored: 0,
        missing: [],
        unexpectedFiles: [],
      });
    });
  });

  describe('while another transaction is open', () => {
    it('reads committed rows only', async () => {
      await service.registerModel(modelInput(), artifact());
      const reads: Array<Promise<ModelWithVersions>> = [];

      await expect(
        metadataStore.transaction(async (repo) => {
          await repo.deleteModel(1);
          reads.push(service.getModel(1));
          throw new Error('aborted');
        })
      ).rejects.toThrow('aborted');

      const [model] = await Promise.all(reads);
      expect(model?.name).toBe('Resnet 50');
      expect(model?.versions).toHaveLength(1);
    });

    it('keeps artifact status updates when that transaction rolls back', async () => {
      await service.registerModel(modelInput(), artifact());
      artifactStore.files.delete('resnet_50/1/weights.bin');

      const verifying = service.verifyArtifacts();
      await expect(
        metadataStore.transaction(async (repo) => {
          await repo.updateModel(1, { description: 'discarded', updatedAt: NOW });
          await new Promise((resolve) => setTimeout(resolve, 5));
          throw new Error('aborted');
        })
      ).rejects.toThrow('aborted');
      const report = await verifying;

      expect(report.missing).toHaveLength(1);
      await expect(service.getVersion(1, 1)).resolves.toMatchObject({ artifactStatus: 'missing' });
      await expect(service.getModel(1)).resolves.toMatchObject({ description: 'image classifier' });
    });
  });

  it('lists models with their versions', async () => {
    await expect(service.listModels()).resolves.toEqual([]);

    await service.registerModel(modelInput(), artifact());
    await service.registerModel(modelInput({ name: 'Bert' }), artifact());
    await service.registerVersion(2, versionInput(), artifact());

    const models = await service.listModels();

    expect(models.map((m) => [m.name, m.versions.map((v) => v.versionNumber)])).toEqual([
      ['Resnet 50', [1]],
      ['Bert', [1, 2]],
    ]);
  });
});
