/**
 * Registry schema migrations
 *
 * Migrations are append-only. Each one runs in its own transaction and is
 * recorded in `schema_version`; opening a store applies whatever is pending.
 */

import { DateTime } from 'luxon';
import type { SqliteClient } from '../sqlite/sqlite-client.js';
import { logger } from '../logger.js';

export interface SchemaMigration {
  version: number;
  name: string;
  statements: string[];
}

export const MIGRATIONS: readonly SchemaMigration[] = [
  {
    version: 1,
    name: 'initial_registry_schema',
    statements: [
      `CREATE TABLE IF NOT EXISTS models (
        model_id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        name_key TEXT NOT NULL UNIQUE,
        storage_key TEXT NOT NULL UNIQUE,
        description TEXT NOT NULL,
        created_by TEXT NOT NULL,
        tags TEXT NOT NULL DEFAULT '{}',
        latest_version_number INTEGER NOT NULL DEFAULT 1,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )`,
      `CREATE TABLE IF NOT EXISTS versions (
        version_id INTEGER PRIMARY KEY AUTOINCREMENT,
        model_id INTEGER NOT NULL REFERENCES models(model_id) ON DELETE CASCADE,
        version_number INTEGER NOT NULL,
        description TEXT NOT NULL,
        created_by TEXT NOT NULL,
        tags TEXT NOT NULL DEFAULT '{}',
        metrics TEXT NOT NULL DEFAULT '{}',
        parameters TEXT NOT NULL DEFAULT '{}',
        file_name TEXT NOT NULL,
        artifact_status TEXT NOT NULL DEFAULT 'pending'
          CHECK (artifact_status IN ('pending', 'stored', 'missing')),
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        UNIQUE (model_id, version_number)
      )`,
      `CREATE INDEX IF NOT EXISTS idx_versions_model_id ON versions(model_id)`,
      `CREATE TABLE IF NOT EXISTS aliases (
        alias_id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        version_id INTEGER NOT NULL UNIQUE REFERENCES versions(version_id) ON DELETE CASCADE,
        created_at TEXT NOT NULL
      )`,
    ],
  },
];

const SCHEMA_VERSION_TABLE = `CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY,
  name TEXT NOT NULL,
  applied_at TEXT NOT NULL
)`;

/**
 * Current schema version; 0 for a fresh database
 */
export async function getCurrentSchemaVersion(client: SqliteClient): Promise<number> {
  await client.exec(SCHEMA_VERSION_TABLE);
  const row = await client.get('SELECT MAX(version) AS version FROM schema_version');

  if (row !== null && typeof row === 'object' && 'version' in row && typeof row.version === 'number') {
    return row.version;
  }
  return 0;
}

/**
 * Apply every pending migration
 *
 * @returns the schema version after migrating
 */
export async function migrate(
  client: SqliteClient,
  migrations: readonly SchemaMigration[] = MIGRATIONS
): Promise<number> {
  let current = await getCurrentSchemaVersion(client);

  for (const migration of migrations) {
    if (migration.version <= current) {
      continue;
    }

    const started = Date.now();
    await client.transaction(async (tx) => {
      for (const statement of migration.statements) {
        await tx.run(statement);
      }
      await tx.run('INSERT INTO schema_version (version, name, applied_at) VALUES (?, ?, ?)', [
        migration.version,
        migration.name,
        DateTime.utc().toISO(),
      ]);
    });

    logger.info('Schema migration applied', {
      version: migration.version,
      name: migration.name,
      executionTimeMs: Date.now() - started,
    });
    current = migration.version;
  }

  return current;
}
