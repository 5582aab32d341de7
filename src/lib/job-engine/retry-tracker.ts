/**
 * Retry tracker - per-job failure bookkeeping and backoff
 */

import type { JobStore } from './job-store';
import type { RetryInfo, RetryPolicy } from './types';

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxRetries: 3,
  baseDelayMs: 10_000,
  maxDelayMs: 600_000,
  jitterFactor: 0.1,
};

/** Larger factors could schedule a retry at `now`. */
export const MAX_JITTER_FACTOR = 0.5;

/**
 * Delay before retry number `attempt` (1-based), never below 1ms
 * Formula: base_delay * 2^(attempt - 1), capped, then spread by +/-jitterFactor
 * (at most MAX_JITTER_FACTOR)
 *
 * With the defaults:
 * - Retry 1: ~10s
 * - Retry 2: ~20s
 * - Retry 3: ~40s
 */
export function calculateRetryDelay(
  attempt: number,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  random: () => number = Math.random
): number {
  const exponentialDelay = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  const cappedDelay = Math.min(exponentialDelay, policy.maxDelayMs);

  const jitterFactor = Math.min(policy.jitterFactor, MAX_JITTER_FACTOR);
  if (jitterFactor <= 0) {
    return Math.max(1, cappedDelay);
  }

  const jitter = (random() * 2 - 1) * jitterFactor;
  return Math.max(1, Math.floor(cappedDelay * (1 + jitter)));
}

export class RetryTracker {
  constructor(
    private readonly store: JobStore,
    readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    private readonly random: () => number = Math.random
  ) {}

  /**
   * Store the failure message on the job's retry record, creating the record
   * (retryCount 0) on the first failure. The count itself only moves on requeue.
   */
  recordFailure(jobId: string, message: string, now: number): RetryInfo {
    const existing = this.store.getRetryInfo(jobId);
    const info: RetryInfo = existing
      ? { ...existing, lastErrorMessage: message, updatedAt: now }
      : {
          jobId,
          retryCount: 0,
          maxRetries: this.policy.maxRetries,
          nextRetryAt: null,
          lastErrorMessage: message,
          createdAt: now,
          updatedAt: now,
        };

    this.store.saveRetryInfo(info);
    return info;
  }

  canRetry(info: RetryInfo): boolean {
    return info.retryCount < info.maxRetries;
  }

  nextRetryAt(info: RetryInfo, now: number): number {
    return now + calculateRetryDelay(info.retryCount + 1, this.policy, this.random);
  }

  /** Called once the job completes. */
  clear(jobId: string): void {
    this.store.deleteRetryInfo(jobId);
  }
}
