/**
 * Ports Barrel Export
 *
 * The registry engine depends on these interfaces only.
 */

export type { ClockPort } from './clockPort.js';
export { createSystemClock, toIsoTimestamp } from './clockPort.js';
export type { ArtifactStorePort } from './artifact-store-port.js';
export type { MetadataRepository, MetadataStorePort } from './metadata-store-port.js';
