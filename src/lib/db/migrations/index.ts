// Schema migrations, tracked in SQLite's user_version
import type BetterSqlite3 from 'better-sqlite3';
import migration001 from './001_jobs';
import migration002 from './002_tasks';
import migration003 from './003_reports';
import migration004 from './004_job_retries';
import { getLogger } from '@/lib/log/logger';

const log = getLogger({ module: 'DBMigrations' });

export interface Migration {
  version: number;
  description: string;
  up: (db: BetterSqlite3.Database) => void;
}

// Ascending, one version apart
export const migrations: readonly Migration[] = [migration001, migration002, migration003, migration004];

export function getCurrentSchemaVersion(db: BetterSqlite3.Database): number {
  const version: unknown = db.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
}

/**
 * Apply every migration newer than the database, all in one transaction
 * @throws Error when the database is newer than this build
 */
export function runMigrations(db: BetterSqlite3.Database): void {
  const currentVersion = getCurrentSchemaVersion(db);
  const latest = migrations[migrations.length - 1].version;

  if (currentVersion > latest) {
    throw new Error(`Database schema v${currentVersion} is newer than this build (v${latest})`);
  }
  const pending = migrations.filter(migration => migration.version > currentVersion);
  if (pending.length === 0) {
    log.debug({ currentVersion }, 'schema up to date');
    return;
  }

  db.transaction(() => {
    for (const migration of pending) {
      log.info({ version: migration.version, description: migration.description }, 'applying migration');
      migration.up(db);
      db.pragma(`user_version = ${migration.version}`);
    }
  })();

  log.info({ from: currentVersion, to: latest }, 'schema migrated');
}
