/**
 * Job Store - the persistence contract the engine consumes, and its SQLite implementation
 */

import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import { DbClient } from '@/lib/db/client';
import {
  compareAndSwapJob,
  deleteCompletedJobsBefore,
  getJobById,
  getRunningJobs,
  selectNextEligibleJob,
  upsertJob,
} from '@/lib/db/jobs';
import { insertReport } from '@/lib/db/reports';
import { deleteRetryInfo, getRetryInfo, upsertRetryInfo } from '@/lib/db/job-retries';
import { queryTasks, setTaskStatusForJob, updateTasks } from '@/lib/db/tasks';
import { ConcurrentClaimError, DuplicateReportError, StoreUnavailableError } from './errors';
import { startJob } from './state-machine';
import type { Job, JobStatus, Report, RetryInfo, Task, TaskFilter, TaskStatus } from './types';

export interface JobStore {
  /**
   * Atomically move the oldest eligible queued job to `running` for this
   * worker. Returns null when nothing is eligible or another job is running.
   * @throws ConcurrentClaimError when another caller wins the race
   */
  claimNextEligibleJob(workerId: string, now: number): Job | null;
  /** Idempotent upsert; a stored newer version, or different content at the same version, wins. */
  persist(job: Job): boolean;
  /**
   * Write `job` only if the stored row still has `expected` version and status.
   * @returns false when another writer got there first
   */
  compareAndSwap(job: Job, expected: { version: number; status: JobStatus }): boolean;
  getJob(id: string): Job | null;
  findRunningJobs(startedBefore?: number): Job[];
  listTasks(filter?: TaskFilter): Task[];
  updateTasks(batch: readonly Task[]): number;
  setTaskStatusForJob(jobId: string, from: TaskStatus, to: TaskStatus, now: number): number;
  /** @throws DuplicateReportError when the job already has a report */
  createReport(report: Report): Report;
  getRetryInfo(jobId: string): RetryInfo | null;
  saveRetryInfo(info: RetryInfo): void;
  deleteRetryInfo(jobId: string): void;
  deleteCompletedJobsBefore(cutoff: number, excludeJobId?: string): number;
  transaction<T>(fn: () => T): T;
}

const UNAVAILABLE_CODES = [
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
  'SQLITE_IOERR',
  'SQLITE_CANTOPEN',
  'SQLITE_FULL',
  'SQLITE_READONLY',
  'SQLITE_PROTOCOL',
  'SQLITE_NOTADB',
  'SQLITE_CORRUPT',
];

function hasSqliteCode(error: unknown, code: string): boolean {
  return error instanceof Database.SqliteError && (error.code === code || error.code.startsWith(`${code}_`));
}

export class SqliteJobStore implements JobStore {
  private readonly client: DbClient;

  constructor(db: BetterSqlite3.Database) {
    this.client = new DbClient(db);
  }

  claimNextEligibleJob(workerId: string, now: number): Job | null {
    return this.guard('claimNextEligibleJob', () =>
      this.client.transaction(() => {
        const candidate = selectNextEligibleJob(this.client, now);
        if (!candidate) {
          return null;
        }

        const running = startJob(candidate, workerId, now);
        const swapped = compareAndSwapJob(this.client, running, {
          version: candidate.version,
          status: 'queued',
        });
        if (!swapped) {
          throw new ConcurrentClaimError(candidate.id);
        }
        return running;
      }, { immediate: true })
    );
  }

  persist(job: Job): boolean {
    return this.guard('persist', () => upsertJob(this.client, job));
  }

  compareAndSwap(job: Job, expected: { version: number; status: JobStatus }): boolean {
    return this.guard('compareAndSwap', () => compareAndSwapJob(this.client, job, expected));
  }

  getJob(id: string): Job | null {
    return this.guard('getJob', () => getJobById(this.client, id));
  }

  findRunningJobs(startedBefore?: number): Job[] {
    return this.guard('findRunningJobs', () => getRunningJobs(this.client, startedBefore));
  }

  listTasks(filter: TaskFilter = {}): Task[] {
    return this.guard('listTasks', () => queryTasks(this.client, filter));
  }

  updateTasks(batch: readonly Task[]): number {
    if (batch.length === 0) return 0;
    return this.guard('updateTasks', () =>
      this.client.transaction(() => updateTasks(this.client, batch))
    );
  }

  setTaskStatusForJob(jobId: string, from: TaskStatus, to: TaskStatus, now: number): number {
    return this.guard('setTaskStatusForJob', () => setTaskStatusForJob(this.client, jobId, from, to, now));
  }

  createReport(report: Report): Report {
    return this.guard('createReport', () => {
      try {
        insertReport(this.client, report);
      } catch (error) {
        if (hasSqliteCode(error, 'SQLITE_CONSTRAINT_UNIQUE')) {
          throw new DuplicateReportError(report.jobId, { cause: error });
        }
        throw error;
      }
      return report;
    });
  }

  getRetryInfo(jobId: string): RetryInfo | null {
    return this.guard('getRetryInfo', () => getRetryInfo(this.client, jobId));
  }

  saveRetryInfo(info: RetryInfo): void {
    this.guard('saveRetryInfo', () => upsertRetryInfo(this.client, info));
  }

  deleteRetryInfo(jobId: string): void {
    this.guard('deleteRetryInfo', () => deleteRetryInfo(this.client, jobId));
  }

  deleteCompletedJobsBefore(cutoff: number, excludeJobId?: string): number {
    return this.guard('deleteCompletedJobsBefore', () =>
      deleteCompletedJobsBefore(this.client, cutoff, excludeJobId)
    );
  }

  transaction<T>(fn: () => T): T {
    return this.guard('transaction', () => this.client.transaction(fn));
  }

  /**
   * Translate driver faults into StoreUnavailableError; domain errors pass through.
   */
  private guard<T>(operation: string, fn: () => T): T {
    if (!this.client.db.open) {
      throw new StoreUnavailableError(operation);
    }
    try {
      return fn();
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        throw error;
      }
      if (UNAVAILABLE_CODES.some(code => hasSqliteCode(error, code))) {
        throw new StoreUnavailableError(operation, { cause: error });
      }
      throw error;
    }
  }
}
