// ============================================================================
// SERVER CONFIGURATION
// Environment variable overrides, loaded from .env by dotenv in server.ts
// ============================================================================

import { isAbsolute, join } from 'node:path';

export const SERVER_CONFIG = {
  port: parseInt(process.env.PORT || '3001', 10),
  host: process.env.HOST || 'localhost',
  logRequests: process.env.LOG_REQUESTS !== 'false',
} as const;

// ============================================================================
// DATABASE CONFIGURATION
// ============================================================================

export const DATABASE_CONFIG = {
  url: process.env.DATABASE_URL || process.env.TEST_DATABASE_URL || 'sqlite:///termeles.db',
  migrationsDir: process.env.MIGRATIONS_DIR || join(process.cwd(), 'migrations'),
} as const;

// ============================================================================
// CHART CONFIGURATION
// ============================================================================

export const CHART_CONFIG = {
  width: parseInt(process.env.CHART_WIDTH || '800', 10),
  height: parseInt(process.env.CHART_HEIGHT || '400', 10),
} as const;

export const VIEWS_DIR = join(process.cwd(), 'views');

const SQLITE_PREFIX = 'sqlite:///';

/**
 * Turns a connection string into a path better-sqlite3 can open.
 *
 * `sqlite:///termeles.db` is relative to the working directory,
 * `sqlite:////var/data/termeles.db` is absolute and `sqlite:///:memory:`
 * opens an in-memory database. A bare path is used as given.
 */
export function resolveDatabasePath(url: string): string {
  if (url === ':memory:') return url;

  if (url.startsWith(SQLITE_PREFIX)) {
    const path = url.slice(SQLITE_PREFIX.length);
    if (!path) {
      throw new Error(`Invalid database URL "${url}": missing file path`);
    }
    if (path === ':memory:' || isAbsolute(path)) return path;
    return join(process.cwd(), path);
  }

  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(url)) {
    throw new Error(`Unsupported database URL "${url}": only sqlite:/// is supported`);
  }

  return url;
}
