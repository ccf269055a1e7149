/**
 * Registry domain types
 *
 * Rows of the metadata store (Model, Version, Alias) and the results the
 * registry engine hands back to its callers.
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Free-form, string-keyed labels */
export type Tags = Record<string, JsonValue>;

/** Numeric evaluation results (accuracy, loss, ...) */
export type Metrics = Record<string, number>;

/** Training or inference parameters */
export type Parameters = Record<string, JsonValue>;

/**
 * Whether a version's bytes reached the artifact store.
 *
 * - pending: metadata committed, artifact write not (yet) confirmed
 * - stored: artifact write confirmed
 * - missing: an integrity check found no bytes for this version
 */
export type ArtifactStatus = 'pending' | 'stored' | 'missing';

export interface ModelRecord {
  modelId: number;
  /** Display name, stored verbatim */
  name: string;
  /** Normalized current name; unique across models */
  nameKey: string;
  /** Normalized name at creation; artifacts live under it and it never changes */
  storageKey: string;
  description: string;
  createdBy: string;
  tags: Tags;
  /**
   * Count of versions ever created. Only used to compute the next version
   * number; deleting a version never lowers it.
   */
  latestVersionNumber: number;
  createdAt: string;
  updatedAt: string;
}

export interface VersionRecord {
  versionId: number;
  modelId: number;
  versionNumber: number;
  description: string;
  createdBy: string;
  tags: Tags;
  metrics: Metrics;
  parameters: Parameters;
  /** Normalized artifact file name */
  fileName: string;
  artifactStatus: ArtifactStatus;
  createdAt: string;
  updatedAt: string;
}

export interface AliasRecord {
  aliasId: number;
  /** Unique across the whole registry, not per model */
  name: string;
  versionId: number;
  createdAt: string;
}

export interface VersionWithAlias extends VersionRecord {
  alias: AliasRecord | null;
}

export interface ModelWithVersions extends ModelRecord {
  versions: VersionWithAlias[];
}

export type NewModel = Omit<ModelRecord, 'modelId'>;

export type NewVersion = Omit<VersionRecord, 'versionId'>;

export type NewAlias = Omit<AliasRecord, 'aliasId'>;

export type ModelChanges = Partial<
  Pick<ModelRecord, 'name' | 'nameKey' | 'description' | 'createdBy' | 'tags' | 'latestVersionNumber'>
> & { updatedAt: string };

/**
 * Uploaded artifact as received from the caller
 */
export interface ArtifactUpload {
  /** Original (unnormalized) file name */
  fileName: string;
  content: Uint8Array;
}

// ============================================================================
// Operation results
// ============================================================================

export interface RegisterModelResult {
  modelId: number;
  name: string;
  versionNumber: number;
  message: string;
}

export interface RegisterVersionResult {
  modelId: number;
  versionNumber: number;
  versionId: number;
  message: string;
}

export interface DeleteModelResult {
  modelId: number;
  name: string;
  deletedVersions: number[];
  message: string;
}

export interface DeleteVersionResult {
  modelId: number;
  versionNumber: number;
  /** Whether the artifact store still held bytes for the version */
  artifactRemoved: boolean;
  message: string;
}

/**
 * Outcome of resolving a version's artifact. `missing` means the metadata
 * exists but the store has no bytes: an integrity gap, not a missing record.
 */
export type ArtifactResolution =
  | {
      status: 'available';
      modelId: number;
      versionNumber: number;
      modelName: string;
      fileName: string;
      filePath: string;
    }
  | {
      status: 'missing';
      modelId: number;
      versionNumber: number;
      modelName: string;
      fileName: string;
    };

export interface AliasResolution {
  alias: string;
  modelId: number;
  modelName: string;
  version: VersionWithAlias;
}

export interface MissingArtifact {
  modelId: number;
  modelName: string;
  versionNumber: number;
  fileName: string;
  previousStatus: ArtifactStatus;
}

export interface UnexpectedArtifactFile {
  modelId: number;
  versionNumber: number;
  fileName: string;
}

export interface IntegrityReport {
  checked: number;
  stored: number;
  missing: MissingArtifact[];
  /** Files in a version's directory other than the recorded artifact */
  unexpectedFiles: UnexpectedArtifactFile[];
}
