/**
 * SQLite client
 *
 * Promise wrapper around a single sqlite3 connection. Constraint violations
 * become ConflictError, every other driver failure a DatabaseError.
 */

import sqlite3 from 'sqlite3';
import type { Database, RunResult } from 'sqlite3';
import { ConflictError, DatabaseError } from '@modelvault/utils';
import { logger } from '../logger.js';

export type SqlValue = string | number | null;

export type SqlParams = readonly SqlValue[];

export interface SqlRunResult {
  lastID: number;
  changes: number;
}

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Translate a driver error. UNIQUE violations are the storage-level guard
 * behind the registry's read-then-write existence checks.
 */
export function toStoreError(error: Error, sql: string): ConflictError | DatabaseError {
  if (errorCode(error) === 'SQLITE_CONSTRAINT' && error.message.includes('UNIQUE')) {
    return new ConflictError('Unique constraint violated', { detail: error.message });
  }

  return new DatabaseError(error.message, sql.trim().split(/\s+/)[0]?.toUpperCase(), {
    code: errorCode(error),
  });
}

/**
 * Statements against one connection
 */
export interface SqlExecutor {
  run(sql: string, params?: SqlParams): Promise<SqlRunResult>;
  get(sql: string, params?: SqlParams): Promise<unknown>;
  all(sql: string, params?: SqlParams): Promise<unknown[]>;
  exec(sql: string): Promise<void>;
}

class ConnectionExecutor implements SqlExecutor {
  constructor(private readonly db: Database) {}

  run(sql: string, params: SqlParams = []): Promise<SqlRunResult> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, function (this: RunResult, error: Error | null) {
        if (error) {
          reject(toStoreError(error, sql));
          return;
        }
        resolve({ lastID: this.lastID, changes: this.changes });
      });
    });
  }

  get(sql: string, params: SqlParams = []): Promise<unknown> {
    return new Promise((resolve, reject) => {
      this.db.get(sql, params, (error: Error | null, row: unknown) => {
        if (error) {
          reject(toStoreError(error, sql));
          return;
        }
        resolve(row);
      });
    });
  }

  all(sql: string, params: SqlParams = []): Promise<unknown[]> {
    return new Promise((resolve, reject) => {
      this.db.all(sql, params, (error: Error | null, rows: unknown[]) => {
        if (error) {
          reject(toStoreError(error, sql));
          return;
        }
        resolve(rows);
      });
    });
  }

  exec(sql: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.exec(sql, (error: Error | null) => {
        if (error) {
          reject(toStoreError(error, sql));
          return;
        }
        resolve();
      });
    });
  }
}

/**
 * Every statement and every transaction on the connection goes through one
 * queue, so a statement never runs inside another caller's open transaction.
 * Statements inside a transaction use the executor handed to its handler;
 * calling the client itself from there would wait on the transaction.
 */
export class SqliteClient implements SqlExecutor {
  private queue: Promise<unknown> = Promise.resolve();
  private readonly connection: ConnectionExecutor;

  private constructor(
    private readonly db: Database,
    readonly filename: string
  ) {
    this.connection = new ConnectionExecutor(db);
  }

  static open(filename: string): Promise<SqliteClient> {
    return new Promise((resolve, reject) => {
      const db = new sqlite3.Database(filename, (error) => {
        if (error) {
          reject(new DatabaseError(`Failed to open database: ${error.message}`, 'OPEN', { filename }));
          return;
        }
        logger.debug('SQLite database opened', { filename });
        resolve(new SqliteClient(db, filename));
      });
    });
  }

  run(sql: string, params: SqlParams = []): Promise<SqlRunResult> {
    return this.serialize(() => this.connection.run(sql, params));
  }

  get(sql: string, params: SqlParams = []): Promise<unknown> {
    return this.serialize(() => this.connection.get(sql, params));
  }

  all(sql: string, params: SqlParams = []): Promise<unknown[]> {
    return this.serialize(() => this.connection.all(sql, params));
  }

  exec(sql: string): Promise<void> {
    return this.serialize(() => this.connection.exec(sql));
  }

  /**
   * Run `handler` between BEGIN IMMEDIATE and COMMIT, rolling back when it
   * throws. The queue stays held until the transaction has finished.
   */
  transaction<T>(handler: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    return this.serialize(async () => {
      const tx = this.connection;
      await tx.exec('BEGIN IMMEDIATE');
      try {
        const result = await handler(tx);
        await tx.exec('COMMIT');
        return result;
      } catch (error) {
        await tx.exec('ROLLBACK').catch((rollbackError: unknown) => {
          logger.error('SQLite rollback failed', rollbackError, { filename: this.filename });
        });
        throw error;
      }
    });
  }

  close(): Promise<void> {
    return this.serialize(
      () =>
        new Promise<void>((resolve, reject) => {
          this.db.close((error) => {
            if (error) {
              reject(new DatabaseError(`Failed to close database: ${error.message}`, 'CLOSE'));
              return;
            }
            logger.debug('SQLite database closed', { filename: this.filename });
            resolve();
          });
        })
    );
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    // the next task waits for this one whether or not it failed
    this.queue = result.catch(() => undefined);
    return result;
  }
}
