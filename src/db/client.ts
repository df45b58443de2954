/**
 * Database Client Module
 *
 * Opens the SQLite store file, applies migrations and exposes helpers for
 * scoping a connection or a transaction to one unit of work.
 */

import Database from 'better-sqlite3';
import { logger } from '../core/logger.js';
import { DatabaseError, toError } from '../errors/index.js';
import { runMigrations } from './migrate.js';

export type SqliteDb = Database.Database;

export interface OpenOptions {
  readonly?: boolean;
  fileMustExist?: boolean;
  migrate?: boolean;
}

/**
 * Opens a SQLite database file (or ':memory:')
 *
 * Migrations run on every writable open; they are idempotent.
 */
export function openDatabase(path: string, options: OpenOptions = {}): SqliteDb {
  const { readonly = false, fileMustExist = false, migrate = !readonly } = options;

  let db: SqliteDb;
  try {
    db = new Database(path, { readonly, fileMustExist });
  } catch (err) {
    const error = toError(err);
    logger.error({ err, path }, 'Failed to open database');
    throw new DatabaseError(`Failed to open database ${path}: ${error.message}`, 'open', error);
  }

  if (!readonly && path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  if (migrate) {
    runMigrations(db);
  }

  logger.debug({ path, readonly }, 'Database opened');
  return db;
}

/**
 * Opens the store, runs `work` against it and always closes it afterwards
 */
export async function withDatabase<T>(path: string, work: (db: SqliteDb) => Promise<T>): Promise<T> {
  const db = openDatabase(path);
  try {
    return await work(db);
  } finally {
    db.close();
    logger.debug({ path }, 'Database closed');
  }
}

/**
 * Runs async work inside one transaction
 *
 * better-sqlite3's `db.transaction()` only wraps synchronous functions, so the
 * transaction is driven by hand. Anything thrown rolls back every write made by `work`.
 */
export async function inTransaction<T>(db: SqliteDb, work: () => Promise<T>): Promise<T> {
  db.exec('BEGIN');
  try {
    const result = await work();
    db.exec('COMMIT');
    return result;
  } catch (err) {
    if (db.inTransaction) {
      db.exec('ROLLBACK');
      logger.warn({ err }, 'Transaction rolled back');
    }
    throw err;
  }
}
