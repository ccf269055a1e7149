/**
 * Artifact Store Port
 *
 * Port interface for the backend that holds raw artifact bytes. The registry
 * engine depends on this port, not on a specific backend.
 *
 * Every artifact is addressed by (model key, version number, file name).
 * Implementations are not transactional: each call can fail on its own,
 * independently of the metadata store.
 *
 * @packageDocumentation
 */

export interface ArtifactStorePort {
  /**
   * Persist bytes under (modelKey, versionNumber, fileName), replacing any
   * previous content.
   *
   * @returns true once the bytes are written
   */
  save(fileName: string, modelKey: string, versionNumber: number, content: Uint8Array): Promise<boolean>;

  /**
   * Remove an artifact.
   *
   * @returns whether the artifact was present; deleting an absent artifact is not an error
   */
  delete(fileName: string, modelKey: string, versionNumber: number): Promise<boolean>;

  /**
   * Resolve a readable location for the artifact.
   *
   * @returns the path, or null when the artifact is absent
   */
  resolvePath(fileName: string, modelKey: string, versionNumber: number): Promise<string | null>;

  checkExists(fileName: string, modelKey: string, versionNumber: number): Promise<boolean>;

  /**
   * Names of every file stored for a model version; empty when none.
   */
  listFiles(modelKey: string, versionNumber: number): Promise<string[]>;
}
