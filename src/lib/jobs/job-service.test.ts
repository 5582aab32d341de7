import type BetterSqlite3 from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DbClient } from '@/lib/db/client';
import { upsertRetryInfo } from '@/lib/db/job-retries';
import { JobNotEditableError, ValidationError } from '@/lib/errors';
import { JobHandlerRegistry } from '@/lib/job-engine/handler-registry';
import { registerBuiltInHandlers } from '@/lib/job-engine/handlers';
import { BASE_TIME, createClock, createTestDatabase, seedJob, seedTask } from '@/test/fixtures';
import { JobService } from './job-service';

describe('JobService', () => {
  let db: BetterSqlite3.Database;
  let clock: ReturnType<typeof createClock>;
  let service: JobService;

  beforeEach(() => {
    db = createTestDatabase();
    clock = createClock();
    service = new JobService(db, registerBuiltInHandlers(new JobHandlerRegistry()), clock.now);
    seedTask(db, { id: 'task-1' });
    seedTask(db, { id: 'task-2', title: 'Book venue', createdAt: BASE_TIME + 1 });
  });

  afterEach(() => {
    db.close();
  });

  it('lists the registered job types', () => {
    expect(service.getAvailableJobTypes()).toEqual(['mark-tasks-completed', 'generate-task-list', 'cleanup-old-jobs']);
  });

  describe('createJob', () => {
    it('queues a job and assigns its tasks', () => {
      const job = service.createJob({ jobType: 'mark-tasks-completed', taskIds: ['task-1', 'task-2', 'task-1'] });

      expect(job).toMatchObject({
        jobType: 'mark-tasks-completed',
        status: 'queued',
        createdAt: '2025-01-15T09:30:00.000Z',
        scheduledAt: null,
        hasReport: false,
        reportId: null,
        taskIds: ['task-1', 'task-2'],
        retryCount: 0,
        maxRetries: null,
        nextRetryAt: null,
        lastErrorMessage: null,
      });
      expect(service.getJobById(job.id)).toEqual(job);
    });

    it('keeps a future schedule when not run immediately', () => {
      const job = service.createJob({
        jobType: 'generate-task-list',
        taskIds: ['task-1'],
        runImmediately: false,
        scheduledAt: '2025-01-16T08:00:00Z',
      });

      expect(job.scheduledAt).toBe('2025-01-16T08:00:00.000Z');
    });

    it('ignores the schedule when run immediately', () => {
      const job = service.createJob({
        jobType: 'generate-task-list',
        taskIds: ['task-1'],
        scheduledAt: BASE_TIME + 60_000,
      });

      expect(job.scheduledAt).toBeNull();
    });

    it('requires at least one task', () => {
      expect(() => service.createJob({ jobType: 'generate-task-list', taskIds: [] })).toThrow(
        'taskIds: At least one task must be selected for job processing.'
      );
    });

    it('rejects an unknown job type', () => {
      expect(() => service.createJob({ jobType: 'send-email', taskIds: ['task-1'] })).toThrow(
        new ValidationError(
          "Invalid job type: 'send-email'. Available types: mark-tasks-completed, generate-task-list, cleanup-old-jobs"
        )
      );
    });

    it('names the task ids that do not exist', () => {
      expect(() => service.createJob({ jobType: 'generate-task-list', taskIds: ['task-1', 'ghost'] })).toThrow(
        'The following task IDs do not exist: ghost'
      );
    });

    it('only marks pending tasks completed', () => {
      seedTask(db, { id: 'done', title: 'Send invoices', status: 'completed' });

      expect(() => service.createJob({ jobType: 'mark-tasks-completed', taskIds: ['task-1', 'done'] })).toThrow(
        "'mark-tasks-completed' can only process pending tasks. The following selected tasks are not pending: 'Send invoices'"
      );
    });

    it('rejects tasks held by another unfinished job', () => {
      seedJob(db, { id: 'other' });
      seedTask(db, { id: 'held', title: 'Print badges', jobId: 'other' });

      expect(() => service.createJob({ jobType: 'generate-task-list', taskIds: ['held'] })).toThrow(
        "The following tasks are already assigned to another job: 'Print badges'"
      );
    });

    it('lets a task move on once its previous job completed', () => {
      seedJob(db, { id: 'old', status: 'completed' });
      seedTask(db, { id: 'reused', jobId: 'old' });

      const job = service.createJob({ jobType: 'generate-task-list', taskIds: ['reused'] });

      expect(job.taskIds).toEqual(['reused']);
    });

    it('rejects a schedule in the past', () => {
      expect(() =>
        service.createJob({
          jobType: 'generate-task-list',
          taskIds: ['task-1'],
          runImmediately: false,
          scheduledAt: BASE_TIME - 1,
        })
      ).toThrow('Scheduled time cannot be in the past.');
    });
  });

  describe('updateJob', () => {
    it('replaces type, schedule and tasks of a queued job', () => {
      const created = service.createJob({ jobType: 'mark-tasks-completed', taskIds: ['task-1'] });
      clock.advance(1000);

      const updated = service.updateJob(created.id, {
        jobType: 'generate-task-list',
        taskIds: ['task-2'],
        runImmediately: false,
        scheduledAt: BASE_TIME + 3_600_000,
      });

      expect(updated).toMatchObject({
        id: created.id,
        jobType: 'generate-task-list',
        scheduledAt: '2025-01-15T10:30:00.000Z',
        taskIds: ['task-2'],
      });
      expect(db.prepare('SELECT version FROM jobs WHERE id = ?').pluck().get(created.id)).toBe(2);
    });

    it('returns null for a missing job', () => {
      expect(service.updateJob('missing', { jobType: 'generate-task-list', taskIds: ['task-1'] })).toBeNull();
    });

    it('refuses to edit a job that has left queued', () => {
      seedJob(db, { id: 'busy', status: 'running', startedAt: BASE_TIME, claimedBy: 'worker-a' });

      expect(() => service.updateJob('busy', { jobType: 'generate-task-list', taskIds: ['task-1'] })).toThrow(
        new JobNotEditableError('busy', 'running')
      );
    });
  });

  describe('deleteJob', () => {
    it('deletes a queued job and frees its tasks', () => {
      const created = service.createJob({ jobType: 'generate-task-list', taskIds: ['task-1'] });

      expect(service.deleteJob(created.id)).toBe(true);
      expect(service.getJobById(created.id)).toBeNull();
      expect(db.prepare('SELECT job_id FROM tasks WHERE id = ?').pluck().get('task-1')).toBeNull();
      expect(service.deleteJob(created.id)).toBe(false);
    });

    it('refuses to delete a completed job', () => {
      seedJob(db, { id: 'done', status: 'completed', finishedAt: BASE_TIME });

      expect(() => service.deleteJob('done')).toThrow(
        'Cannot modify a completed job. Only queued jobs can be edited or deleted.'
      );
    });
  });

  describe('queries', () => {
    it('lists newest first and filters by status', () => {
      seedJob(db, { id: 'older', createdAt: BASE_TIME });
      seedJob(db, { id: 'newer', createdAt: BASE_TIME + 1000, status: 'failed' });

      expect(service.getJobs().map(job => job.id)).toEqual(['newer', 'older']);
      expect(service.getJobs({ status: 'failed' }).map(job => job.id)).toEqual(['newer']);
    });

    it('counts jobs per status', () => {
      seedJob(db, { id: 'a' });
      seedJob(db, { id: 'b', status: 'failed' });
      seedJob(db, { id: 'c', status: 'failed' });

      expect(service.countJobsByStatus()).toEqual({ queued: 1, running: 0, completed: 0, failed: 2 });
    });

    it('includes retry state', () => {
      seedJob(db, { id: 'retrying', scheduledAt: BASE_TIME + 20_000 });
      upsertRetryInfo(new DbClient(db), {
        jobId: 'retrying',
        retryCount: 1,
        maxRetries: 3,
        nextRetryAt: BASE_TIME + 20_000,
        lastErrorMessage: 'Disk full',
        createdAt: BASE_TIME,
        updatedAt: BASE_TIME,
      });

      expect(service.getJobById('retrying')).toMatchObject({
        retryCount: 1,
        maxRetries: 3,
        nextRetryAt: '2025-01-15T09:30:20.000Z',
        lastErrorMessage: 'Disk full',
      });
    });
  });
});
