import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { NewModel, NewVersion } from '@modelvault/core';
import { ConflictError } from '@modelvault/utils';
import { SqliteMetadataStore } from '../../src/metadata/sqlite-metadata-store.js';

const NOW = '2026-01-15T10:00:00.000Z';
const LATER = '2026-01-15T11:00:00.000Z';

function newModel(name: string, key: string): NewModel {
  return {
    name,
    nameKey: key,
    storageKey: key,
    description: `${name} model`,
    createdBy: 'alice',
    tags: { team: 'vision' },
    latestVersionNumber: 1,
    createdAt: NOW,
    updatedAt: NOW,
  };
}

function newVersion(modelId: number, versionNumber: number): NewVersion {
  return {
    modelId,
    versionNumber,
    description: `version ${versionNumber}`,
    createdBy: 'alice',
    tags: { stage: 'dev' },
    metrics: { accuracy: 0.91 },
    parameters: { layers: [64, 128], optimizer: { name: 'adam', lr: 0.001 } },
    fileName: 'weights.bin',
    artifactStatus: 'pending',
    createdAt: NOW,
    updatedAt: NOW,
  };
}

describe('SqliteMetadataStore (integration)', () => {
  let store: SqliteMetadataStore;

  beforeEach(async () => {
    store = await SqliteMetadataStore.open('sqlite://');
  });

  afterEach(async () => {
    await store.close();
  });

  describe('models', () => {
    it('inserts and reads back a model with JSON columns', async () => {
      const model = await store.insertModel(newModel('Resnet 50', 'resnet_50'));

      expect(model).toEqual({
        modelId: 1,
        name: 'Resnet 50',
        nameKey: 'resnet_50',
        storageKey: 'resnet_50',
        description: 'Resnet 50 model',
        createdBy: 'alice',
        tags: { team: 'vision' },
        latestVersionNumber: 1,
        createdAt: NOW,
        updatedAt: NOW,
      });
      await expect(store.findModelById(1)).resolves.toEqual(model);
    });

    it('finds models by name key or storage key', async () => {
      const model = await store.insertModel(newModel('Resnet 50', 'resnet_50'));
      await store.updateModel(model.modelId, { name: 'Resnet 101', nameKey: 'resnet_101', updatedAt: LATER });

      const byName = await store.findModelByKey('resnet_101');
      const byStorage = await store.findModelByKey('resnet_50');

      expect(byName?.modelId).toBe(model.modelId);
      expect(byStorage?.modelId).toBe(model.modelId);
      await expect(store.findModelByKey('unknown')).resolves.toBeNull();
    });

    it('prefers a name key match over a storage key match', async () => {
      const renamed = await store.insertModel(newModel('Shared', 'shared'));
      await store.updateModel(renamed.modelId, { name: 'Other', nameKey: 'other', updatedAt: LATER });
      const other = await store.insertModel(newModel('Fresh', 'fresh'));
      await store.updateModel(other.modelId, { name: 'Shared', nameKey: 'shared', updatedAt: LATER });

      const found = await store.findModelByKey('shared');

      expect(found?.modelId).toBe(other.modelId);
    });

    it('rejects a duplicate name key with ConflictError', async () => {
      await store.insertModel(newModel('Resnet 50', 'resnet_50'));

      await expect(store.insertModel(newModel('resnet_50', 'resnet_50'))).rejects.toThrow(ConflictError);
    });

    it('updates only the supplied columns', async () => {
      const model = await store.insertModel(newModel('Resnet 50', 'resnet_50'));

      const updated = await store.updateModel(model.modelId, {
        description: 'retrained',
        tags: { team: 'platform' },
        updatedAt: LATER,
      });

      expect(updated.name).toBe('Resnet 50');
      expect(updated.description).toBe('retrained');
      expect(updated.tags).toEqual({ team: 'platform' });
      expect(updated.updatedAt).toBe(LATER);
      expect(updated.createdAt).toBe(NOW);
    });

    it('lists and counts models in id order', async () => {
      await store.insertModel(newModel('b', 'b'));
      await store.insertModel(newModel('a', 'a'));

      const models = await store.listModels();

      expect(models.map((m) => m.name)).toEqual(['b', 'a']);
      await expect(store.countModels()).resolves.toBe(2);
    });
  });

  describe('versions and aliases', () => {
    it('returns versions in ascending order with their alias attached', async () => {
      const model = await store.insertModel(newModel('Resnet 50', 'resnet_50'));
      await store.insertVersion(newVersion(model.modelId, 2));
      const first = await store.insertVersion(newVersion(model.modelId, 1));
      const alias = await store.insertAlias({ name: 'prod', versionId: first.versionId, createdAt: NOW });

      const versions = await store.listVersions(model.modelId);

      expect(versions.map((v) => v.versionNumber)).toEqual([1, 2]);
      expect(versions[0]?.alias).toEqual(alias);
      expect(versions[1]?.alias).toBeNull();
      expect(versions[0]?.parameters).toEqual({ layers: [64, 128], optimizer: { name: 'adam', lr: 0.001 } });
    });

    it('rejects a duplicate version number for the same model', async () => {
      const model = await store.insertModel(newModel('Resnet 50', 'resnet_50'));
      await store.insertVersion(newVersion(model.modelId, 1));

      await expect(store.insertVersion(newVersion(model.modelId, 1))).rejects.toThrow(ConflictError);
    });

    it('keeps alias names unique across models', async () => {
      const a = await store.insertModel(newModel('a', 'a'));
      const b = await store.insertModel(newModel('b', 'b'));
      const va = await store.insertVersion(newVersion(a.modelId, 1));
      const vb = await store.insertVersion(newVersion(b.modelId, 1));
      await store.insertAlias({ name: 'prod', versionId: va.versionId, createdAt: NOW });

      await expect(
        store.insertAlias({ name: 'prod', versionId: vb.versionId, createdAt: NOW })
      ).rejects.toThrow(ConflictError);
    });

    it('records artifact status changes', async () => {
      const model = await store.insertModel(newModel('a', 'a'));
      const version = await store.insertVersion(newVersion(model.modelId, 1));

      await store.setArtifactStatus(version.versionId, 'stored', LATER);

      const reloaded = await store.findVersion(model.modelId, 1);
      expect(reloaded?.artifactStatus).toBe('stored');
      expect(reloaded?.updatedAt).toBe(LATER);
    });

    it('cascades a model delete to versions and aliases', async () => {
      const model = await store.insertModel(newModel('a', 'a'));
      const version = await store.insertVersion(newVersion(model.modelId, 1));
      await store.insertAlias({ name: 'prod', versionId: version.versionId, createdAt: NOW });

      await expect(store.deleteModel(model.modelId)).resolves.toBe(true);

      await expect(store.findVersionById(version.versionId)).resolves.toBeNull();
      await expect(store.findAliasByName('prod')).resolves.toBeNull();
      await expect(store.deleteModel(model.modelId)).resolves.toBe(false);
    });

    it('frees an alias name when its version is deleted', async () => {
      const model = await store.insertModel(newModel('a', 'a'));
      const version = await store.insertVersion(newVersion(model.modelId, 1));
      await store.insertAlias({ name: 'prod', versionId: version.versionId, createdAt: NOW });

      await store.deleteVersion(version.versionId);

      await expect(store.findAliasByName('prod')).resolves.toBeNull();
    });
  });

  describe('transaction', () => {
    it('rolls back every write when the work fails', async () => {
      await expect(
        store.transaction(async (repo) => {
          await repo.insertModel(newModel('a', 'a'));
          await repo.insertModel(newModel('a', 'a'));
        })
      ).rejects.toThrow(ConflictError);

      await expect(store.countModels()).resolves.toBe(0);
    });

    it('commits when the work succeeds', async () => {
      const id = await store.transaction(async (repo) => {
        const model = await repo.insertModel(newModel('a', 'a'));
        await repo.insertVersion(newVersion(model.modelId, 1));
        return model.modelId;
      });

      await expect(store.listVersions(id)).resolves.toHaveLength(1);
    });
  });
});
