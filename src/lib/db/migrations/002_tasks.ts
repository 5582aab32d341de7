// Board tasks, optionally assigned to a job
import type BetterSqlite3 from 'better-sqlite3';
import type { Migration } from './index';

const migration: Migration = {
  version: 2,
  description: 'Create tasks table',

  up(db: BetterSqlite3.Database) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS tasks (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        status TEXT NOT NULL DEFAULT 'pending'
          CHECK(status IN ('pending', 'in-progress', 'completed')),
        job_id TEXT REFERENCES jobs(id) ON DELETE SET NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_tasks_job
        ON tasks(job_id, status);

      CREATE INDEX IF NOT EXISTS idx_tasks_status_created
        ON tasks(status, created_at ASC);
    `);
  },
};

export default migration;
