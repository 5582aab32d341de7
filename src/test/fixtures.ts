import type BetterSqlite3 from 'better-sqlite3';
import { DbClient } from '@/lib/db/client';
import { IN_MEMORY, openDatabase } from '@/lib/db/connection';
import { insertJob } from '@/lib/db/jobs';
import { insertTask } from '@/lib/db/tasks';
import type { Job, Task } from '@/lib/job-engine/types';

export const BASE_TIME = Date.UTC(2025, 0, 15, 9, 30, 0);

export function createTestDatabase(): BetterSqlite3.Database {
  return openDatabase(IN_MEMORY);
}

/**
 * Mutable clock for code that takes a `clock` option
 */
export function createClock(start: number = BASE_TIME): { now: () => number; advance: (ms: number) => void; set: (at: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: ms => {
      current += ms;
    },
    set: at => {
      current = at;
    },
  };
}

export function buildJob(overrides: Partial<Job> = {}): Job {
  return {
    id: 'job-1',
    jobType: 'mark-tasks-completed',
    status: 'queued',
    version: 1,
    createdAt: BASE_TIME,
    updatedAt: BASE_TIME,
    scheduledAt: null,
    startedAt: null,
    finishedAt: null,
    claimedBy: null,
    ...overrides,
  };
}

export function buildTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 'task-1',
    title: 'Write release notes',
    description: '',
    status: 'pending',
    createdAt: BASE_TIME,
    updatedAt: BASE_TIME,
    jobId: null,
    ...overrides,
  };
}

export function seedJob(db: BetterSqlite3.Database, overrides: Partial<Job> = {}): Job {
  const job = buildJob(overrides);
  insertJob(new DbClient(db), job);
  return job;
}

export function seedTask(db: BetterSqlite3.Database, overrides: Partial<Task> = {}): Task {
  const task = buildTask(overrides);
  insertTask(new DbClient(db), task);
  return task;
}
