import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { StorageError, describeError } from './errors.js';
import type {
  AggregateProductionInput,
  AggregateProductionRecord,
  WorkerProductionInput,
  WorkerProductionRecord,
} from './types/production.js';

export type DatabaseHandle = Database.Database;

export interface OpenDatabaseOptions {
  /** File path or ':memory:' (see resolveDatabasePath in config.ts) */
  path: string;
  migrationsDir: string;
}

export function openDatabase({ path, migrationsDir }: OpenDatabaseOptions): DatabaseHandle {
  if (path !== ':memory:') {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(path);
  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  applyMigrations(db, migrationsDir);
  console.log(`[Database] Initialized at ${path}`);
  return db;
}

export function closeDatabase(db: DatabaseHandle): void {
  if (db.open) {
    db.close();
    console.log('[Database] Connection closed');
  }
}

// ============================================================================
// MIGRATIONS
// Files are named NNN_description.sql; the highest applied NNN is kept in
// SQLite's user_version pragma.
// ============================================================================

const MIGRATION_FILE = /^(\d+)_[\w-]+\.sql$/;

export function applyMigrations(db: DatabaseHandle, migrationsDir: string): number {
  const current = db.pragma('user_version', { simple: true });
  const currentVersion = typeof current === 'number' ? current : 0;

  const pending = readdirSync(migrationsDir)
    .map((file) => {
      const match = MIGRATION_FILE.exec(file);
      return match ? { version: Number(match[1]), file } : null;
    })
    .filter((entry): entry is { version: number; file: string } => entry !== null)
    .filter(({ version }) => version > currentVersion)
    .sort((a, b) => a.version - b.version);

  for (const { version, file } of pending) {
    const sql = readFileSync(join(migrationsDir, file), 'utf-8');
    db.transaction(() => {
      db.exec(sql);
      db.pragma(`user_version = ${version}`);
    })();
    console.log(`[Database] Applied migration ${file}`);
  }

  return pending.length;
}

// ============================================================================
// SCOPED TRANSACTIONS
// ============================================================================

function toStorageError(error: unknown): StorageError {
  if (error instanceof StorageError) return error;
  return new StorageError(`Database error: ${describeError(error)}`, error);
}

/**
 * Runs `work` inside a transaction. Commits when it returns, rolls back when
 * it throws. Any failure coming out of SQLite is rethrown as StorageError.
 */
export function withTransaction<T>(db: DatabaseHandle, work: (db: DatabaseHandle) => T): T {
  try {
    return db.transaction(() => work(db))();
  } catch (error) {
    throw toStorageError(error);
  }
}

/** Plain reads need no transaction, only the same error wrapping. */
export function withRead<T>(work: () => T): T {
  try {
    return work();
  } catch (error) {
    throw toStorageError(error);
  }
}

// ============================================================================
// TERMELES TABLE (aggregate production)
// ============================================================================

export function insertAggregate(db: DatabaseHandle, input: AggregateProductionInput): AggregateProductionRecord {
  const stmt = db.prepare(`
    INSERT INTO termeles (ev, honap, nap, aranytermeles, ezusttermeles, gyemanttermeles)
    VALUES (?, ?, ?, ?, ?, ?)
  `);

  const result = stmt.run(input.year, input.month, input.day, input.gold, input.silver, input.diamond);

  return {
    id: Number(result.lastInsertRowid),
    ev: input.year,
    honap: input.month,
    nap: input.day,
    aranytermeles: input.gold,
    ezusttermeles: input.silver,
    gyemanttermeles: input.diamond,
  };
}

export function getLatestAggregate(db: DatabaseHandle): AggregateProductionRecord | null {
  const stmt = db.prepare<[], AggregateProductionRecord>('SELECT * FROM termeles ORDER BY id DESC LIMIT 1');
  return stmt.get() ?? null;
}

export function iterateAggregates(db: DatabaseHandle): IterableIterator<AggregateProductionRecord> {
  return db.prepare<[], AggregateProductionRecord>('SELECT * FROM termeles ORDER BY id').iterate();
}

export function listAggregatesChronological(db: DatabaseHandle): AggregateProductionRecord[] {
  return db
    .prepare<[], AggregateProductionRecord>('SELECT * FROM termeles ORDER BY ev, honap, nap, id')
    .all();
}

export function countAggregates(db: DatabaseHandle): number {
  const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM termeles').get();
  return row ? row.count : 0;
}

// ============================================================================
// DWARF_AS_WORKERS TABLE (per-worker production)
// ============================================================================

export function insertWorker(db: DatabaseHandle, input: WorkerProductionInput): WorkerProductionRecord {
  const stmt = db.prepare(`
    INSERT INTO dwarf_as_workers (name, date, gold, silver, diamond)
    VALUES (?, ?, ?, ?, ?)
  `);

  const result = stmt.run(input.name, input.date, input.gold, input.silver, input.diamond);

  return {
    id: Number(result.lastInsertRowid),
    ...input,
  };
}

export function getLatestWorker(db: DatabaseHandle): WorkerProductionRecord | null {
  const stmt = db.prepare<[], WorkerProductionRecord>('SELECT * FROM dwarf_as_workers ORDER BY id DESC LIMIT 1');
  return stmt.get() ?? null;
}

export function iterateWorkers(db: DatabaseHandle): IterableIterator<WorkerProductionRecord> {
  return db.prepare<[], WorkerProductionRecord>('SELECT * FROM dwarf_as_workers ORDER BY id').iterate();
}

export function countWorkers(db: DatabaseHandle): number {
  const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM dwarf_as_workers').get();
  return row ? row.count : 0;
}
