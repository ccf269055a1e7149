/**
 * DATABASE_URL → sqlite filename
 *
 * Accepted forms:
 *   sqlite:///models.db        relative path `models.db`
 *   sqlite:////var/lib/reg.db  absolute path `/var/lib/reg.db`
 *   sqlite:// or :memory:      in-memory database
 *   ./models.db                bare path
 */

import { ConfigurationError } from '@modelvault/utils';

export const IN_MEMORY = ':memory:';

const SQLITE_PREFIX = 'sqlite:///';

export function resolveSqliteFilename(databaseUrl: string): string {
  const url = databaseUrl.trim();

  if (url === IN_MEMORY || url === 'sqlite://' || url === `${SQLITE_PREFIX}${IN_MEMORY}`) {
    return IN_MEMORY;
  }

  if (url.startsWith(SQLITE_PREFIX)) {
    const filename = url.slice(SQLITE_PREFIX.length);
    if (filename.length === 0) {
      throw new ConfigurationError(`DATABASE_URL has no file path: ${databaseUrl}`, 'DATABASE_URL');
    }
    return filename;
  }

  if (/^[a-z][a-z0-9+.-]*:/i.test(url)) {
    throw new ConfigurationError(
      `Unsupported DATABASE_URL scheme (only sqlite is supported): ${databaseUrl}`,
      'DATABASE_URL'
    );
  }

  return url;
}
