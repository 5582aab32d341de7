// Reports produced by jobs (one per job)
import type BetterSqlite3 from 'better-sqlite3';
import type { Migration } from './index';

const migration: Migration = {
  version: 3,
  description: 'Create reports table',

  up(db: BetterSqlite3.Database) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS reports (
        id TEXT PRIMARY KEY,
        job_id TEXT NOT NULL UNIQUE REFERENCES jobs(id) ON DELETE CASCADE,
        file_name TEXT NOT NULL,
        content TEXT NOT NULL,
        content_type TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'generated'
          CHECK(status IN ('generated', 'downloaded', 'expired')),
        created_at INTEGER NOT NULL
      );
    `);
  },
};

export default migration;
