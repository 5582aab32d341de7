// Jobs processed by the background worker
import type BetterSqlite3 from 'better-sqlite3';
import type { Migration } from './index';

const migration: Migration = {
  version: 1,
  description: 'Create jobs table',

  up(db: BetterSqlite3.Database) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS jobs (
        -- Identity
        id TEXT PRIMARY KEY,
        job_type TEXT NOT NULL,

        -- Status
        status TEXT NOT NULL DEFAULT 'queued'
          CHECK(status IN ('queued', 'running', 'completed', 'failed')),

        -- Optimistic locking
        version INTEGER NOT NULL DEFAULT 0,

        -- Execution tracking
        claimed_by TEXT,
        started_at INTEGER,
        finished_at INTEGER,

        -- Scheduling
        scheduled_at INTEGER,

        -- Timestamps (epoch ms)
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      -- Claim query: oldest eligible queued job first
      CREATE INDEX IF NOT EXISTS idx_jobs_eligible
        ON jobs(status, created_at ASC, scheduled_at)
        WHERE status = 'queued';

      CREATE INDEX IF NOT EXISTS idx_jobs_type
        ON jobs(job_type, status);
    `);
  },
};

export default migration;
