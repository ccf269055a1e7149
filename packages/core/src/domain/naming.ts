/**
 * Storage key normalization
 *
 * Model names and artifact file names become path segments through this
 * function; display names are stored untouched.
 */

/**
 * Lower-case the name and replace every space with an underscore.
 *
 * @example normalizeName('Resnet 50') // 'resnet_50'
 */
export function normalizeName(name: string): string {
  return name.toLowerCase().replaceAll(' ', '_');
}

const UNSAFE_SEGMENT = /[/\\\0]/;

/**
 * Whether a normalized key can be used as a single path segment of the
 * artifact store without escaping its directory.
 */
export function isSafePathSegment(segment: string): boolean {
  return segment.length > 0 && segment !== '.' && segment !== '..' && !UNSAFE_SEGMENT.test(segment);
}
