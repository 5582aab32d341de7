import { describe, expect, it } from 'vitest';
import { buildJob } from '@/test/fixtures';
import { ConcurrentClaimError, InvalidTransitionError } from './errors';
import { canTransition, completeJob, failJob, isTerminal, requeueJob, startJob } from './state-machine';
import { failure, success } from './types';
import type { JobStatus, RetryInfo } from './types';

const NOW = Date.UTC(2025, 0, 15, 10, 0, 0);

function retryInfo(overrides: Partial<RetryInfo> = {}): RetryInfo {
  return {
    jobId: 'job-1',
    retryCount: 0,
    maxRetries: 3,
    nextRetryAt: null,
    lastErrorMessage: 'boom',
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  };
}

describe('canTransition', () => {
  const allowed: Array<[JobStatus, JobStatus]> = [
    ['queued', 'running'],
    ['running', 'completed'],
    ['running', 'failed'],
    ['failed', 'queued'],
  ];

  it('allows exactly the lifecycle edges', () => {
    const statuses: JobStatus[] = ['queued', 'running', 'completed', 'failed'];
    for (const from of statuses) {
      for (const to of statuses) {
        const expected = allowed.some(([a, b]) => a === from && b === to);
        expect(canTransition(from, to), `${from} -> ${to}`).toBe(expected);
      }
    }
  });

  it('treats only completed as terminal', () => {
    expect(isTerminal('completed')).toBe(true);
    expect(isTerminal('failed')).toBe(false);
    expect(isTerminal('queued')).toBe(false);
  });
});

describe('startJob', () => {
  it('moves a queued job to running and records the claim', () => {
    const job = buildJob({ version: 4 });
    const running = startJob(job, 'worker-a', NOW);

    expect(running).toMatchObject({
      status: 'running',
      version: 5,
      claimedBy: 'worker-a',
      startedAt: NOW,
      finishedAt: null,
      updatedAt: NOW,
    });
    expect(job.status).toBe('queued');
  });

  it('reports a job that is already running as a lost claim', () => {
    const running = buildJob({ status: 'running' });
    expect(() => startJob(running, 'worker-b', NOW)).toThrow(ConcurrentClaimError);
  });

  it('rejects starting a completed job', () => {
    expect(() => startJob(buildJob({ status: 'completed' }), 'worker-a', NOW)).toThrow(InvalidTransitionError);
  });
});

describe('completeJob', () => {
  it('completes a running job on success', () => {
    const running = buildJob({ status: 'running', version: 2 });
    const completed = completeJob(running, success({ tasksProcessed: 2 }), NOW);

    expect(completed.status).toBe('completed');
    expect(completed.version).toBe(3);
    expect(completed.finishedAt).toBe(NOW);
  });

  it('refuses to complete on a failure result', () => {
    const running = buildJob({ status: 'running' });
    expect(() => completeJob(running, failure('nope'), NOW)).toThrow(InvalidTransitionError);
  });

  it('refuses to complete a queued job', () => {
    expect(() => completeJob(buildJob(), success(), NOW)).toThrow(
      'Invalid transition for job job-1: queued -> completed'
    );
  });
});

describe('failJob', () => {
  it('fails a running job', () => {
    const failed = failJob(buildJob({ status: 'running', version: 2 }), 'disk full', NOW);
    expect(failed).toMatchObject({ status: 'failed', version: 3, finishedAt: NOW });
  });

  it('requires a reason', () => {
    expect(() => failJob(buildJob({ status: 'running' }), '  ', NOW)).toThrow(InvalidTransitionError);
  });
});

describe('requeueJob', () => {
  it('requeues with the retry time and increments retryCount by one', () => {
    const failed = buildJob({ status: 'failed', version: 3, claimedBy: 'worker-a', startedAt: NOW - 5000, finishedAt: NOW });
    const nextRetryAt = NOW + 10_000;

    const { job, retry } = requeueJob(failed, retryInfo({ retryCount: 1 }), nextRetryAt, NOW);

    expect(job).toMatchObject({
      status: 'queued',
      version: 4,
      scheduledAt: nextRetryAt,
      claimedBy: null,
      startedAt: null,
      finishedAt: null,
    });
    expect(retry.retryCount).toBe(2);
    expect(retry.nextRetryAt).toBe(nextRetryAt);
  });

  it('refuses once retries are exhausted', () => {
    const failed = buildJob({ status: 'failed' });
    expect(() => requeueJob(failed, retryInfo({ retryCount: 3 }), NOW + 1, NOW)).toThrow(
      'Invalid transition for job job-1: failed -> queued (retries exhausted (3/3))'
    );
  });

  it('only requeues failed jobs', () => {
    expect(() => requeueJob(buildJob({ status: 'running' }), retryInfo(), NOW + 1, NOW)).toThrow(
      InvalidTransitionError
    );
  });
});
