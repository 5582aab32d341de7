/**
 * Job runner - takes one claimed job from `running` to its next resting state
 */

import { generateUUIDv7 } from '@/lib/utils/uuid';
import { getLogger } from '@/lib/log/logger';
import type { Logger } from '@/lib/log/logger';
import {
  ExecutorFailure,
  InvalidTransitionError,
  StoreUnavailableError,
  UnknownJobTypeError,
  errorMessage,
} from './errors';
import type { JobHandlerRegistry } from './handler-registry';
import type { JobStore } from './job-store';
import type { JobEventMap, JobEventType, JobNotifier } from './notifier';
import type { RetryTracker } from './retry-tracker';
import { completeJob, failJob, requeueJob } from './state-machine';
import { failure } from './types';
import type { ExecutionResult, Job, JobContext, JobHandler, Report } from './types';

export const DEFAULT_JOB_TIMEOUT_MS = 5 * 60 * 1000;

export const STALE_JOB_REASON = 'Job execution timed out';

export interface JobRunnerOptions {
  store: JobStore;
  registry: JobHandlerRegistry;
  retryTracker: RetryTracker;
  workerId: string;
  notifier?: JobNotifier;
  /** Upper bound on one handler invocation (default: 5 minutes) */
  jobTimeoutMs?: number;
  clock?: () => number;
}

/**
 * Reject as soon as `signal` aborts, whether or not `work` has settled
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    void work.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class JobRunner {
  private readonly store: JobStore;
  private readonly registry: JobHandlerRegistry;
  private readonly retryTracker: RetryTracker;
  private readonly workerId: string;
  private readonly notifier?: JobNotifier;
  private readonly jobTimeoutMs: number;
  private readonly clock: () => number;
  private readonly log = getLogger({ module: 'JobRunner' });

  constructor(options: JobRunnerOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.retryTracker = options.retryTracker;
    this.workerId = options.workerId;
    this.notifier = options.notifier;
    this.jobTimeoutMs = options.jobTimeoutMs ?? DEFAULT_JOB_TIMEOUT_MS;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Execute a job already claimed as `running` and persist the outcome.
   * Only store faults and conflicting writes escape; every handler error
   * ends up on the failure path.
   * @returns the job as last persisted
   */
  async run(claimed: Job, signal: AbortSignal): Promise<Job> {
    const log = this.log.child({ jobId: claimed.id, jobType: claimed.jobType });
    this.notifyStatus(claimed);

    const handler = this.registry.has(claimed.jobType) ? this.registry.resolve(claimed.jobType) : null;
    const locked = handler?.locksTasks
      ? this.store.setTaskStatusForJob(claimed.id, 'pending', 'in-progress', this.clock())
      : 0;
    log.info({ workerId: this.workerId, lockedTasks: locked }, 'job started');

    try {
      const result = await this.execute(claimed, handler, signal, log);
      if (result.kind === 'failure') {
        return this.fail(claimed, result.reason, log);
      }

      let outcome: { completed: Job; report: Report | null };
      try {
        outcome = this.complete(claimed, result);
      } catch (error) {
        if (error instanceof StoreUnavailableError || error instanceof InvalidTransitionError) throw error;
        log.error({ err: error }, 'job could not be completed');
        return this.fail(claimed, errorMessage(error), log);
      }

      log.info(
        { tasksProcessed: result.kind === 'success' ? result.tasksProcessed : undefined, reportId: outcome.report?.id },
        'job completed'
      );
      this.notifyStatus(outcome.completed);
      if (outcome.report) {
        this.notify('report-generated', {
          jobId: claimed.id,
          reportId: outcome.report.id,
          fileName: outcome.report.fileName,
          updatedAt: new Date(outcome.completed.updatedAt).toISOString(),
        });
      }
      return outcome.completed;
    } finally {
      this.releaseTasks(claimed, log);
    }
  }

  /**
   * Fail a `running` job this process is not executing and route it
   * through the retry path.
   */
  recover(orphan: Job, reason: string = STALE_JOB_REASON): Job {
    const log = this.log.child({ jobId: orphan.id, jobType: orphan.jobType });
    log.warn({ claimedBy: orphan.claimedBy, startedAt: orphan.startedAt, reason }, 'recovering orphaned job');
    try {
      return this.fail(orphan, reason, log);
    } finally {
      this.releaseTasks(orphan, log);
    }
  }

  private async execute(
    job: Job,
    handler: JobHandler | null,
    signal: AbortSignal,
    log: Logger
  ): Promise<ExecutionResult> {
    const timeout = AbortSignal.timeout(this.jobTimeoutMs);
    const executionSignal = AbortSignal.any([signal, timeout]);

    try {
      executionSignal.throwIfAborted();
      if (!handler) {
        throw new UnknownJobTypeError(job.jobType);
      }
      const context: JobContext = {
        job,
        store: this.store,
        log,
        now: this.clock,
        reportProgress: percent => this.notifyProgress(job, percent),
      };

      const result = await untilAborted(handler.execute(context, executionSignal), executionSignal);
      if (executionSignal.aborted) {
        return failure(this.abortReason(signal));
      }
      return result;
    } catch (error) {
      if (error instanceof StoreUnavailableError) throw error;
      if (executionSignal.aborted) {
        return failure(this.abortReason(signal));
      }
      if (error instanceof ExecutorFailure) {
        log.warn({ reason: error.reason }, 'job handler reported failure');
        return failure(error.reason);
      }
      log.warn({ err: error }, 'job handler threw');
      return failure(errorMessage(error));
    }
  }

  private abortReason(loopSignal: AbortSignal): string {
    return loopSignal.aborted
      ? 'Job cancelled: worker is shutting down'
      : `${STALE_JOB_REASON} after ${this.jobTimeoutMs}ms`;
  }

  /** Report, `completed` and retry cleanup commit together or not at all. */
  private complete(running: Job, result: ExecutionResult): { completed: Job; report: Report | null } {
    const now = this.clock();
    const completed = completeJob(running, result, now);
    const artifact = result.kind === 'success' ? result.artifact : undefined;

    return this.store.transaction(() => {
      const report = artifact
        ? this.store.createReport({
            id: generateUUIDv7(now),
            jobId: running.id,
            fileName: artifact.fileName,
            content: artifact.content,
            contentType: artifact.contentType,
            createdAt: now,
            status: 'generated',
          })
        : null;

      this.persistTransition(running, completed);
      this.retryTracker.clear(running.id);
      return { completed, report };
    });
  }

  private fail(running: Job, rawReason: string, log: Logger): Job {
    const now = this.clock();
    const reason = rawReason.trim().length > 0 ? rawReason : 'Job failed without a reason';

    const outcome = this.store.transaction(() => {
      const failed = failJob(running, reason, now);
      this.persistTransition(running, failed);

      const info = this.retryTracker.recordFailure(running.id, reason, now);
      if (!this.retryTracker.canRetry(info)) {
        return { failed, final: failed, retry: info };
      }

      const next = requeueJob(failed, info, this.retryTracker.nextRetryAt(info, now), now);
      this.persistTransition(failed, next.job);
      this.store.saveRetryInfo(next.retry);
      return { failed, final: next.job, retry: next.retry };
    });

    this.notifyStatus(outcome.failed, reason);
    if (outcome.final.status === 'queued') {
      log.warn(
        {
          reason,
          retryCount: outcome.retry.retryCount,
          maxRetries: outcome.retry.maxRetries,
          nextRetryAt: outcome.retry.nextRetryAt,
        },
        'job failed, retry scheduled'
      );
      this.notifyStatus(outcome.final, reason);
    } else {
      log.error(
        { reason, retryCount: outcome.retry.retryCount, maxRetries: outcome.retry.maxRetries },
        'job failed permanently'
      );
    }
    return outcome.final;
  }

  private persistTransition(from: Job, to: Job): void {
    if (!this.store.compareAndSwap(to, { version: from.version, status: from.status })) {
      throw new InvalidTransitionError(from.id, from.status, to.status, 'stored job changed underneath');
    }
  }

  /** Tasks still locked by this job go back to pending. */
  private releaseTasks(job: Job, log: Logger): void {
    try {
      const released = this.store.setTaskStatusForJob(job.id, 'in-progress', 'pending', this.clock());
      if (released > 0) {
        log.info({ released }, 'tasks released');
      }
    } catch (error) {
      log.error({ err: error }, 'failed to release job tasks');
    }
  }

  private notifyStatus(job: Job, reason?: string): void {
    this.notify('job-status-changed', {
      jobId: job.id,
      jobType: job.jobType,
      status: job.status,
      updatedAt: new Date(job.updatedAt).toISOString(),
      errorMessage: reason,
    });
  }

  private notifyProgress(job: Job, percent: number): void {
    this.notify('job-progress', {
      jobId: job.id,
      progress: Math.min(100, Math.max(0, Math.round(percent))),
      updatedAt: new Date(this.clock()).toISOString(),
    });
  }

  /** Notifier faults are logged; the job's stored state is already final. */
  private notify<K extends JobEventType>(type: K, event: JobEventMap[K]): void {
    try {
      this.notifier?.notify(type, event);
    } catch (error) {
      this.log.error({ err: error, type, jobId: event.jobId }, 'job notification failed');
    }
  }
}
