/**
 * SQLite Metadata Store
 *
 * Implements MetadataStorePort on one sqlite3 connection. Foreign keys are
 * switched on per connection so Model → Version → Alias deletes cascade.
 */

import { mkdir } from 'fs/promises';
import { dirname } from 'path';
import type { z } from 'zod';
import type {
  AliasRecord,
  ArtifactStatus,
  MetadataRepository,
  MetadataStorePort,
  ModelChanges,
  ModelRecord,
  NewAlias,
  NewModel,
  NewVersion,
  VersionRecord,
  VersionWithAlias,
} from '@modelvault/core';
import { DatabaseError } from '@modelvault/utils';
import { SqliteClient, type SqlExecutor, type SqlValue } from '../sqlite/sqlite-client.js';
import { IN_MEMORY, resolveSqliteFilename } from '../sqlite/database-url.js';
import { migrate } from '../migrations/schema.js';
import { AliasRowSchema, CountRowSchema, ModelRowSchema, VersionRowSchema } from './row-schemas.js';
import { logger } from '../logger.js';

const VERSION_SELECT = `
  SELECT v.*, a.alias_id AS alias_id, a.name AS alias_name, a.created_at AS alias_created_at
  FROM versions v
  LEFT JOIN aliases a ON a.version_id = v.version_id`;

const MODEL_COLUMNS: ReadonlyArray<[Exclude<keyof ModelChanges, 'tags'>, string]> = [
  ['name', 'name'],
  ['nameKey', 'name_key'],
  ['description', 'description'],
  ['createdBy', 'created_by'],
  ['latestVersionNumber', 'latest_version_number'],
  ['updatedAt', 'updated_at'],
];

function parseRow<S extends z.ZodTypeAny>(schema: S, row: unknown, table: string): z.output<S> {
  const result = schema.safeParse(row);
  if (!result.success) {
    throw new DatabaseError(`Malformed ${table} row`, 'SELECT', { issues: result.error.issues });
  }
  return result.data;
}

/**
 * Queries of the metadata store over one executor: the client itself, or the
 * executor of an open transaction.
 */
export class SqliteMetadataRepository implements MetadataRepository {
  constructor(protected readonly sql: SqlExecutor) {}

  // ==========================================================================
  // Models
  // ==========================================================================

  async listModels(): Promise<ModelRecord[]> {
    const rows = await this.sql.all('SELECT * FROM models ORDER BY model_id ASC');
    return rows.map((row) => parseRow(ModelRowSchema, row, 'models'));
  }

  async countModels(): Promise<number> {
    const row = await this.sql.get('SELECT COUNT(*) AS count FROM models');
    return parseRow(CountRowSchema, row, 'models').count;
  }

  async findModelById(modelId: number): Promise<ModelRecord | null> {
    const row = await this.sql.get('SELECT * FROM models WHERE model_id = ?', [modelId]);
    return row === undefined ? null : parseRow(ModelRowSchema, row, 'models');
  }

  async findModelByKey(key: string): Promise<ModelRecord | null> {
    const row = await this.sql.get(
      `SELECT * FROM models WHERE name_key = ? OR storage_key = ?
       ORDER BY name_key = ? DESC, model_id ASC LIMIT 1`,
      [key, key, key]
    );
    return row === undefined ? null : parseRow(ModelRowSchema, row, 'models');
  }

  async insertModel(model: NewModel): Promise<ModelRecord> {
    const { lastID } = await this.sql.run(
      `INSERT INTO models
        (name, name_key, storage_key, description, created_by, tags, latest_version_number, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        model.name,
        model.nameKey,
        model.storageKey,
        model.description,
        model.createdBy,
        JSON.stringify(model.tags),
        model.latestVersionNumber,
        model.createdAt,
        model.updatedAt,
      ]
    );
    return this.requireModel(lastID);
  }

  async updateModel(modelId: number, changes: ModelChanges): Promise<ModelRecord> {
    const assignments: string[] = [];
    const params: SqlValue[] = [];

    for (const [key, column] of MODEL_COLUMNS) {
      const value = changes[key];
      if (value !== undefined) {
        assignments.push(`${column} = ?`);
        params.push(value);
      }
    }
    if (changes.tags !== undefined) {
      assignments.push('tags = ?');
      params.push(JSON.stringify(changes.tags));
    }

    await this.sql.run(`UPDATE models SET ${assignments.join(', ')} WHERE model_id = ?`, [
      ...params,
      modelId,
    ]);
    return this.requireModel(modelId);
  }

  async deleteModel(modelId: number): Promise<boolean> {
    const { changes } = await this.sql.run('DELETE FROM models WHERE model_id = ?', [modelId]);
    return changes > 0;
  }

  private async requireModel(modelId: number): Promise<ModelRecord> {
    const model = await this.findModelById(modelId);
    if (!model) {
      throw new DatabaseError(`Model ${modelId} vanished after write`, 'SELECT', { modelId });
    }
    return model;
  }

  // ==========================================================================
  // Versions
  // ==========================================================================

  async listVersions(modelId: number): Promise<VersionWithAlias[]> {
    const rows = await this.sql.all(
      `${VERSION_SELECT} WHERE v.model_id = ? ORDER BY v.version_number ASC`,
      [modelId]
    );
    return rows.map((row) => parseRow(VersionRowSchema, row, 'versions'));
  }

  async findVersion(modelId: number, versionNumber: number): Promise<VersionWithAlias | null> {
    const row = await this.sql.get(
      `${VERSION_SELECT} WHERE v.model_id = ? AND v.version_number = ?`,
      [modelId, versionNumber]
    );
    return row === undefined ? null : parseRow(VersionRowSchema, row, 'versions');
  }

  async findVersionById(versionId: number): Promise<VersionWithAlias | null> {
    const row = await this.sql.get(`${VERSION_SELECT} WHERE v.version_id = ?`, [versionId]);
    return row === undefined ? null : parseRow(VersionRowSchema, row, 'versions');
  }

  async insertVersion(version: NewVersion): Promise<VersionRecord> {
    const { lastID } = await this.sql.run(
      `INSERT INTO versions
        (model_id, version_number, description, created_by, tags, metrics, parameters,
         file_name, artifact_status, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        version.modelId,
        version.versionNumber,
        version.description,
        version.createdBy,
        JSON.stringify(version.tags),
        JSON.stringify(version.metrics),
        JSON.stringify(version.parameters),
        version.fileName,
        version.artifactStatus,
        version.createdAt,
        version.updatedAt,
      ]
    );

    const stored = await this.findVersionById(lastID);
    if (!stored) {
      throw new DatabaseError(`Version ${lastID} vanished after write`, 'SELECT', { versionId: lastID });
    }
    const { alias: _alias, ...record } = stored;
    return record;
  }

  async deleteVersion(versionId: number): Promise<boolean> {
    const { changes } = await this.sql.run('DELETE FROM versions WHERE version_id = ?', [versionId]);
    return changes > 0;
  }

  async setArtifactStatus(versionId: number, status: ArtifactStatus, updatedAt: string): Promise<void> {
    await this.sql.run(
      'UPDATE versions SET artifact_status = ?, updated_at = ? WHERE version_id = ?',
      [status, updatedAt, versionId]
    );
  }

  // ==========================================================================
  // Aliases
  // ==========================================================================

  async findAliasByName(name: string): Promise<AliasRecord | null> {
    const row = await this.sql.get('SELECT * FROM aliases WHERE name = ?', [name]);
    return row === undefined ? null : parseRow(AliasRowSchema, row, 'aliases');
  }

  async insertAlias(alias: NewAlias): Promise<AliasRecord> {
    const { lastID } = await this.sql.run(
      'INSERT INTO aliases (name, version_id, created_at) VALUES (?, ?, ?)',
      [alias.name, alias.versionId, alias.createdAt]
    );

    const row = await this.sql.get('SELECT * FROM aliases WHERE alias_id = ?', [lastID]);
    if (row === undefined) {
      throw new DatabaseError(`Alias ${lastID} vanished after write`, 'SELECT', { aliasId: lastID });
    }
    return parseRow(AliasRowSchema, row, 'aliases');
  }
}

export class SqliteMetadataStore extends SqliteMetadataRepository implements MetadataStorePort {
  private constructor(private readonly client: SqliteClient) {
    super(client);
  }

  /**
   * Open (creating when needed) the database named by DATABASE_URL and bring
   * its schema up to date.
   */
  static async open(databaseUrl: string): Promise<SqliteMetadataStore> {
    const filename = resolveSqliteFilename(databaseUrl);
    if (filename !== IN_MEMORY) {
      await mkdir(dirname(filename), { recursive: true });
    }

    const client = await SqliteClient.open(filename);
    await client.exec('PRAGMA foreign_keys = ON');
    const schemaVersion = await migrate(client);

    logger.info('Metadata store ready', { filename, schemaVersion });
    return new SqliteMetadataStore(client);
  }

  transaction<T>(work: (repo: MetadataRepository) => Promise<T>): Promise<T> {
    return this.client.transaction((tx) => work(new SqliteMetadataRepository(tx)));
  }

  close(): Promise<void> {
    return this.client.close();
  }
}
