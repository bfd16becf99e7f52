import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { SCHEMA_SQL } from './schema.js';
import { moduleLogger } from './logger.js';
import { ValidationError } from './errors.js';

export type Db = Database.Database;

const log = moduleLogger('db');

let dbInstance: Db | null = null;

/**
 * Open (or reopen) the shared connection and apply the schema.
 * `:memory:` gives a private database, used by the test suites.
 */
export function openDatabase(path: string): Db {
  if (dbInstance) {
    closeDatabase();
  }

  const inMemory = path === ':memory:';
  if (!inMemory) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA_SQL);

  dbInstance = db;
  log.debug({ path }, 'Database opened');
  return db;
}

export function getDb(): Db {
  if (!dbInstance) {
    throw new Error('Database has not been opened');
  }
  return dbInstance;
}

export function closeDatabase(): void {
  if (dbInstance) {
    dbInstance.close();
    dbInstance = null;
  }
}

/** Run `fn` in one transaction; any throw rolls the whole thing back. */
export function transaction<T>(fn: (db: Db) => T): T {
  const db = getDb();
  return db.transaction(() => fn(db))();
}

export function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Database.SqliteError &&
    (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
  );
}

/**
 * Run a write whose uniqueness was pre-checked. If a concurrent writer got
 * there first, the unique index rejects it and the caller sees `message`.
 */
export function withUniqueGuard<T>(message: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new ValidationError(message);
    }
    throw error;
  }
}

const MAX_SEQUENCE_ATTEMPTS = 5;

/**
 * Retry a sequence-allocating write when a concurrent writer took the same
 * number first. The unique index is the real guard; this only re-reads max+1.
 */
export function withSequenceRetry<T>(label: string, fn: () => T): T {
  for (let attempt = 1; ; attempt++) {
    try {
      return fn();
    } catch (error) {
      if (!isUniqueViolation(error) || attempt >= MAX_SEQUENCE_ATTEMPTS) {
        throw error;
      }
      log.warn({ label, attempt }, 'Sequence number collision, retrying');
    }
  }
}

export function toFlag(value: boolean): 0 | 1 {
  return value ? 1 : 0;
}

export function fromFlag(value: number): boolean {
  return value === 1;
}

export function insertedId(result: Database.RunResult): number {
  return Number(result.lastInsertRowid);
}
