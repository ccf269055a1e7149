/**
 * @modelvault/core
 *
 * Foundational types and interfaces of the model registry.
 * This package has zero dependencies on other @modelvault packages.
 */

export * from './types/registry.js';
export { isSafePathSegment, normalizeName } from './domain/naming.js';
export * from './schemas/registry.js';
export * from './ports/index.js';
