import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { getDbPath } from '../config.js';
import { StorageError, errorMessage } from '../errors.js';
import { initDb } from './schema.js';

let db: Database.Database | null = null;

/**
 * Apply SQLite performance tuning PRAGMAs.
 * Safe with WAL mode; optimizes for read-heavy workloads.
 */
export function applySqliteTuning(database: Database.Database): void {
  database.pragma('busy_timeout = 5000');
  database.pragma('cache_size = -16000');    // 16MB cache (default ~2MB)
  database.pragma('synchronous = NORMAL');   // Safe with WAL, skip fsync wait
  database.pragma('temp_store = MEMORY');
}

/**
 * Open a database file (or ':memory:') with the schema applied.
 * Foreign keys are enforced so that status rows follow their repository.
 */
export function openDatabase(dbPath: string): Database.Database {
  try {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    const database = new Database(dbPath);
    if (dbPath !== ':memory:') {
      database.pragma('journal_mode = WAL');
    }
    database.pragma('foreign_keys = ON');
    applySqliteTuning(database);
    initDb(database);
    return database;
  } catch (err) {
    throw new StorageError(`Cannot open database ${dbPath}: ${errorMessage(err)}`, { dbPath });
  }
}

/**
 * Get the shared database instance (synchronous, lazy initialization).
 * Safe for Node.js single-threaded model - no async race conditions possible.
 */
export function getDb(): Database.Database {
  if (!db) {
    db = openDatabase(getDbPath());
  }
  return db;
}

/**
 * Override the shared database with an external instance.
 * Used by tests and any code that needs an isolated DB.
 * Call closeDb() to revert to default lazy-init behavior.
 */
export function setDb(database: Database.Database): void {
  db = database;
}

/**
 * Close the shared database connection
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
