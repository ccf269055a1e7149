/**
 * Local Artifact Store
 *
 * Filesystem implementation of ArtifactStorePort. Layout:
 *
 *   <basePath>/<modelKey>/<versionNumber>/<fileName>
 *
 * Directories are created on save and pruned again once a delete leaves
 * them empty.
 */

import { mkdir, readdir, rmdir, stat, unlink, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { isSafePathSegment, type ArtifactStorePort } from '@modelvault/core';
import { StorageError } from '@modelvault/utils';
import { logger } from '../logger.js';

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class LocalArtifactStore implements ArtifactStorePort {
  readonly basePath: string;

  constructor(basePath: string) {
    this.basePath = resolve(basePath);
  }

  async save(
    fileName: string,
    modelKey: string,
    versionNumber: number,
    content: Uint8Array
  ): Promise<boolean> {
    const directory = this.versionDirectory(modelKey, versionNumber);
    const filePath = join(directory, this.segment(fileName, 'fileName'));

    try {
      await mkdir(directory, { recursive: true });
      await writeFile(filePath, content);
    } catch (error) {
      throw new StorageError(`Failed to save artifact: ${describe(error)}`, 'save', {
        modelKey,
        versionNumber,
        fileName,
      });
    }

    logger.debug('Artifact saved', { modelKey, versionNumber, fileName, bytes: content.byteLength });
    return true;
  }

  async delete(fileName: string, modelKey: string, versionNumber: number): Promise<boolean> {
    const directory = this.versionDirectory(modelKey, versionNumber);
    const filePath = join(directory, this.segment(fileName, 'fileName'));

    try {
      await unlink(filePath);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        logger.debug('Artifact already absent', { modelKey, versionNumber, fileName });
        return false;
      }
      throw new StorageError(`Failed to delete artifact: ${describe(error)}`, 'delete', {
        modelKey,
        versionNumber,
        fileName,
      });
    }

    await this.pruneEmpty(directory);
    await this.pruneEmpty(join(this.basePath, modelKey));
    logger.debug('Artifact deleted', { modelKey, versionNumber, fileName });
    return true;
  }

  async resolvePath(fileName: string, modelKey: string, versionNumber: number): Promise<string | null> {
    const filePath = join(this.versionDirectory(modelKey, versionNumber), this.segment(fileName, 'fileName'));
    return (await this.isFile(filePath)) ? filePath : null;
  }

  async checkExists(fileName: string, modelKey: string, versionNumber: number): Promise<boolean> {
    return (await this.resolvePath(fileName, modelKey, versionNumber)) !== null;
  }

  async listFiles(modelKey: string, versionNumber: number): Promise<string[]> {
    const directory = this.versionDirectory(modelKey, versionNumber);

    try {
      const entries = await readdir(directory, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile())
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return [];
      }
      throw new StorageError(`Failed to list artifacts: ${describe(error)}`, 'list', {
        modelKey,
        versionNumber,
      });
    }
  }

  private versionDirectory(modelKey: string, versionNumber: number): string {
    if (!Number.isInteger(versionNumber) || versionNumber < 1) {
      throw new StorageError(`Invalid version number: ${versionNumber}`, 'path', { modelKey, versionNumber });
    }
    return join(this.basePath, this.segment(modelKey, 'modelKey'), String(versionNumber));
  }

  private segment(value: string, field: string): string {
    if (!isSafePathSegment(value)) {
      throw new StorageError(`Unsafe ${field} for artifact path: '${value}'`, 'path', { [field]: value });
    }
    return value;
  }

  private async isFile(filePath: string): Promise<boolean> {
    try {
      return (await stat(filePath)).isFile();
    } catch (error) {
      if (errnoCode(error) === 'ENOENT' || errnoCode(error) === 'ENOTDIR') {
        return false;
      }
      throw new StorageError(`Failed to stat artifact: ${describe(error)}`, 'stat', { filePath });
    }
  }

  /**
   * Remove a directory if it is empty. A directory that still has entries
   * (or is already gone) stays as it is.
   */
  private async pruneEmpty(directory: string): Promise<void> {
    try {
      await rmdir(directory);
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ENOTEMPTY' || code === 'EEXIST' || code === 'ENOENT') {
        return;
      }
      logger.warn('Could not prune artifact directory', { directory, error: describe(error) });
    }
  }
}
