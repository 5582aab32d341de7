import type BetterSqlite3 from 'better-sqlite3';
import { z } from 'zod';
import { DbClient } from '@/lib/db/client';
import { getRetryInfo } from '@/lib/db/job-retries';
import { compareAndSwapJob, countJobsByStatus, deleteJob, getJobById, insertJob, listJobs } from '@/lib/db/jobs';
import { getReportByJobId } from '@/lib/db/reports';
import { assignTasksToJob, getTasksByIds, queryTasks, unassignTasksFromJob } from '@/lib/db/tasks';
import { JobNotEditableError, ValidationError } from '@/lib/errors';
import type { JobHandlerRegistry } from '@/lib/job-engine/handler-registry';
import { JOB_STATUSES } from '@/lib/job-engine/types';
import type { Job, JobStatus } from '@/lib/job-engine/types';
import { getLogger } from '@/lib/log/logger';
import { generateUUIDv7 } from '@/lib/utils/uuid';
import { parseInput } from '@/lib/validation';

const log = getLogger({ module: 'JobService' });

export interface JobDto {
  id: string;
  jobType: string;
  status: JobStatus;
  createdAt: string;
  scheduledAt: string | null;
  hasReport: boolean;
  reportId: string | null;
  reportFileName: string | null;
  taskIds: string[];
  retryCount: number;
  maxRetries: number | null;
  nextRetryAt: string | null;
  lastErrorMessage: string | null;
}

const scheduledAtSchema = z
  .union([
    z.number().int().nonnegative(),
    z
      .string()
      .datetime({ offset: true })
      .transform(value => Date.parse(value)),
  ])
  .nullish();

const jobRequestSchema = z.object({
  jobType: z.string().trim().min(1, 'Job type is required'),
  taskIds: z
    .array(z.string().trim().min(1))
    .min(1, 'At least one task must be selected for job processing.')
    .transform(ids => Array.from(new Set(ids))),
  runImmediately: z.boolean().default(true),
  scheduledAt: scheduledAtSchema,
});

const jobQuerySchema = z.object({
  status: z.enum(JOB_STATUSES).optional(),
  jobType: z.string().trim().min(1).optional(),
  limit: z.number().int().positive().max(500).optional(),
  offset: z.number().int().min(0).optional(),
});

export type JobRequest = z.input<typeof jobRequestSchema>;
export type JobListQuery = z.input<typeof jobQuerySchema>;

type ParsedJobRequest = z.output<typeof jobRequestSchema>;

const UNFINISHED: readonly JobStatus[] = ['queued', 'running'];

function quoteTitles(titles: readonly string[]): string {
  return titles.map(title => `'${title}'`).join(', ');
}

function toIso(timestamp: number | null): string | null {
  return timestamp === null ? null : new Date(timestamp).toISOString();
}

/**
 * Job CRUD for the presentation layer. Jobs are editable only while queued;
 * from then on the worker owns them.
 */
export class JobService {
  private readonly client: DbClient;

  constructor(
    db: BetterSqlite3.Database,
    private readonly registry: JobHandlerRegistry,
    private readonly clock: () => number = Date.now
  ) {
    this.client = new DbClient(db);
  }

  getAvailableJobTypes(): string[] {
    return this.registry.types();
  }

  createJob(input: JobRequest): JobDto {
    const request = parseInput(jobRequestSchema, input);
    const now = this.clock();

    const job = this.client.transaction(() => {
      this.validateRequest(request, now);

      const created: Job = {
        id: generateUUIDv7(now),
        jobType: request.jobType,
        status: 'queued',
        version: 1,
        createdAt: now,
        updatedAt: now,
        scheduledAt: request.runImmediately ? null : request.scheduledAt ?? null,
        startedAt: null,
        finishedAt: null,
        claimedBy: null,
      };

      insertJob(this.client, created);
      assignTasksToJob(this.client, created.id, request.taskIds, now);
      return created;
    });

    log.info({ jobId: job.id, jobType: job.jobType, taskCount: request.taskIds.length }, 'job created');
    return this.toJobDto(job);
  }

  /**
   * Replace a queued job's type, schedule and task selection.
   * @returns null when the job does not exist
   * @throws JobNotEditableError once the job has left `queued`
   */
  updateJob(id: string, input: JobRequest): JobDto | null {
    const request = parseInput(jobRequestSchema, input);
    const now = this.clock();

    const job = this.client.transaction(() => {
      const existing = getJobById(this.client, id);
      if (!existing) {
        return null;
      }
      if (existing.status !== 'queued') {
        throw new JobNotEditableError(existing.id, existing.status);
      }

      this.validateRequest(request, now, existing.id);

      const updated: Job = {
        ...existing,
        jobType: request.jobType,
        scheduledAt: request.runImmediately ? null : request.scheduledAt ?? null,
        version: existing.version + 1,
        updatedAt: now,
      };
      if (!compareAndSwapJob(this.client, updated, { version: existing.version, status: 'queued' })) {
        throw new JobNotEditableError(existing.id, getJobById(this.client, id)?.status ?? existing.status);
      }

      unassignTasksFromJob(this.client, existing.id, now);
      assignTasksToJob(this.client, existing.id, request.taskIds, now);
      return updated;
    });

    if (job) {
      log.info({ jobId: job.id, jobType: job.jobType }, 'job updated');
    }
    return job ? this.toJobDto(job) : null;
  }

  /**
   * @returns false when the job does not exist
   * @throws JobNotEditableError once the job has left `queued`
   */
  deleteJob(id: string): boolean {
    const deleted = this.client.transaction(() => {
      const job = getJobById(this.client, id);
      if (!job) {
        return false;
      }
      if (job.status !== 'queued') {
        throw new JobNotEditableError(job.id, job.status);
      }

      unassignTasksFromJob(this.client, job.id, this.clock());
      return deleteJob(this.client, job.id);
    });

    if (deleted) {
      log.info({ jobId: id }, 'job deleted');
    }
    return deleted;
  }

  getJobById(id: string): JobDto | null {
    const job = getJobById(this.client, id);
    return job ? this.toJobDto(job) : null;
  }

  getJobs(query: JobListQuery = {}): JobDto[] {
    const filters = parseInput(jobQuerySchema, query);
    return listJobs(this.client, filters).map(job => this.toJobDto(job));
  }

  countJobsByStatus(): Record<JobStatus, number> {
    return countJobsByStatus(this.client);
  }

  private validateRequest(request: ParsedJobRequest, now: number, excludeJobId?: string): void {
    if (!this.registry.has(request.jobType)) {
      throw new ValidationError(
        `Invalid job type: '${request.jobType}'. Available types: ${this.registry.types().join(', ')}`
      );
    }

    const tasks = getTasksByIds(this.client, request.taskIds);
    if (tasks.length !== request.taskIds.length) {
      const found = new Set(tasks.map(task => task.id));
      const missing = request.taskIds.filter(taskId => !found.has(taskId));
      throw new ValidationError(`The following task IDs do not exist: ${missing.join(', ')}`);
    }

    if (request.jobType === 'mark-tasks-completed') {
      const notPending = tasks.filter(task => task.status !== 'pending');
      if (notPending.length > 0) {
        throw new ValidationError(
          `'mark-tasks-completed' can only process pending tasks. The following selected tasks are not pending: ${quoteTitles(notPending.map(task => task.title))}`
        );
      }
    }

    const taken = tasks.filter(task => {
      if (task.jobId === null || task.jobId === excludeJobId) return false;
      const owner = getJobById(this.client, task.jobId);
      return owner !== null && UNFINISHED.includes(owner.status);
    });
    if (taken.length > 0) {
      throw new ValidationError(
        `The following tasks are already assigned to another job: ${quoteTitles(taken.map(task => task.title))}`
      );
    }

    if (!request.runImmediately && request.scheduledAt != null && request.scheduledAt <= now) {
      throw new ValidationError('Scheduled time cannot be in the past.');
    }
  }

  private toJobDto(job: Job): JobDto {
    const report = getReportByJobId(this.client, job.id);
    const retry = getRetryInfo(this.client, job.id);
    const tasks = queryTasks(this.client, { jobId: job.id });

    return {
      id: job.id,
      jobType: job.jobType,
      status: job.status,
      createdAt: new Date(job.createdAt).toISOString(),
      scheduledAt: toIso(job.scheduledAt),
      hasReport: report !== null,
      reportId: report?.id ?? null,
      reportFileName: report?.fileName ?? null,
      taskIds: tasks.map(task => task.id),
      retryCount: retry?.retryCount ?? 0,
      maxRetries: retry?.maxRetries ?? null,
      nextRetryAt: toIso(retry?.nextRetryAt ?? null),
      lastErrorMessage: retry?.lastErrorMessage ?? null,
    };
  }
}
