// Database connection and initialization
import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import { join } from 'path';
import { mkdirSync, existsSync } from 'fs';
import { runMigrations } from './migrations';

export const IN_MEMORY = ':memory:';

/**
 * Database file path inside the data directory
 */
export function getDatabasePath(dataDir: string): string {
  return join(dataDir, 'taskboard.sqlite');
}

function ensureDatabaseDirectory(dataDir: string): void {
  try {
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(
      `Failed to create database directory at ${dataDir}: ${message}. ` +
      `Ensure TASKBOARD_DATA_DIR is writable and its parent directory exists.`
    );
  }
}

/**
 * Open a database and bring its schema up to date.
 * Pass IN_MEMORY for a throwaway database (tests).
 */
export function openDatabase(filename: string): BetterSqlite3.Database {
  const db = new Database(filename);

  db.pragma('foreign_keys = ON');

  if (filename !== IN_MEMORY) {
    // WAL lets request handlers read while the worker writes
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');
  }

  // 64MB page cache
  db.pragma('cache_size = -64000');

  runMigrations(db);
  return db;
}

/**
 * Open the application database under the data directory
 */
export function openDataDirectory(dataDir: string): BetterSqlite3.Database {
  ensureDatabaseDirectory(dataDir);
  return openDatabase(getDatabasePath(dataDir));
}

export function closeDatabase(db: BetterSqlite3.Database): void {
  if (db.open) {
    db.close();
  }
}
