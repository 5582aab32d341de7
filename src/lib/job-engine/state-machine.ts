/**
 * Job state machine
 *
 *   queued ──▶ running ──▶ completed
 *                 │
 *                 ▼
 *              failed ──▶ queued   (while retryCount < maxRetries)
 *
 * Every function takes a job value and returns a new one with `version`
 * bumped; nothing is persisted here.
 */

import { ConcurrentClaimError, InvalidTransitionError } from './errors';
import type { ExecutionResult, Job, JobStatus, RetryInfo } from './types';

const TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  queued: ['running'],
  running: ['completed', 'failed'],
  completed: [],
  failed: ['queued'],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(job: Job, to: JobStatus): void {
  if (!canTransition(job.status, to)) {
    throw new InvalidTransitionError(job.id, job.status, to);
  }
}

export function isTerminal(status: JobStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

function advance(job: Job, status: JobStatus, now: number, changes: Partial<Job> = {}): Job {
  return {
    ...job,
    ...changes,
    status,
    version: job.version + 1,
    updatedAt: now,
  };
}

/**
 * queued -> running. A job another worker already moved to `running` is a
 * lost claim race, not a programming error.
 */
export function startJob(job: Job, workerId: string, now: number): Job {
  if (job.status === 'running') {
    throw new ConcurrentClaimError(job.id);
  }
  assertTransition(job, 'running');
  return advance(job, 'running', now, {
    claimedBy: workerId,
    startedAt: now,
    finishedAt: null,
  });
}

/**
 * running -> completed, guarded by a successful execution result
 */
export function completeJob(job: Job, result: ExecutionResult, now: number): Job {
  assertTransition(job, 'completed');
  if (result.kind !== 'success') {
    throw new InvalidTransitionError(job.id, job.status, 'completed', 'execution did not succeed');
  }
  return advance(job, 'completed', now, { finishedAt: now });
}

/**
 * running -> failed
 */
export function failJob(job: Job, reason: string, now: number): Job {
  assertTransition(job, 'failed');
  if (reason.trim().length === 0) {
    throw new InvalidTransitionError(job.id, job.status, 'failed', 'a failure reason is required');
  }
  return advance(job, 'failed', now, { finishedAt: now });
}

/**
 * failed -> queued. `retry` is the record before this attempt is counted;
 * the returned record has retryCount incremented by exactly one.
 */
export function requeueJob(
  job: Job,
  retry: RetryInfo,
  nextRetryAt: number,
  now: number
): { job: Job; retry: RetryInfo } {
  assertTransition(job, 'queued');
  if (retry.retryCount >= retry.maxRetries) {
    throw new InvalidTransitionError(
      job.id,
      job.status,
      'queued',
      `retries exhausted (${retry.retryCount}/${retry.maxRetries})`
    );
  }

  return {
    job: advance(job, 'queued', now, {
      scheduledAt: nextRetryAt,
      claimedBy: null,
      startedAt: null,
      finishedAt: null,
    }),
    retry: {
      ...retry,
      retryCount: retry.retryCount + 1,
      nextRetryAt,
      updatedAt: now,
    },
  };
}
