/**
 * Job Engine Type Definitions
 *
 * All records are immutable values: a change produces a new value that is
 * then persisted. Timestamps are epoch milliseconds.
 */

import type { Logger } from '@/lib/log/logger';
import type { JobStore } from './job-store';

export const JOB_STATUSES = ['queued', 'running', 'completed', 'failed'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export const TASK_STATUSES = ['pending', 'in-progress', 'completed'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const REPORT_STATUSES = ['generated', 'downloaded', 'expired'] as const;
export type ReportStatus = (typeof REPORT_STATUSES)[number];

export const JOB_TYPES = ['mark-tasks-completed', 'generate-task-list', 'cleanup-old-jobs'] as const;
export type JobType = (typeof JOB_TYPES)[number];

export function isJobType(value: string): value is JobType {
  return JOB_TYPES.some(type => type === value);
}

export interface Job {
  readonly id: string;
  /** Stored as free text; unknown values fail at dispatch. */
  readonly jobType: string;
  readonly status: JobStatus;
  readonly version: number;
  readonly createdAt: number;
  readonly updatedAt: number;
  readonly scheduledAt: number | null;
  readonly startedAt: number | null;
  readonly finishedAt: number | null;
  readonly claimedBy: string | null;
}

export interface Task {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly status: TaskStatus;
  readonly createdAt: number;
  readonly updatedAt: number;
  readonly jobId: string | null;
}

export interface Report {
  readonly id: string;
  readonly jobId: string;
  readonly fileName: string;
  readonly content: string;
  readonly contentType: string;
  readonly createdAt: number;
  readonly status: ReportStatus;
}

export interface RetryInfo {
  readonly jobId: string;
  readonly retryCount: number;
  readonly maxRetries: number;
  readonly nextRetryAt: number | null;
  readonly lastErrorMessage: string | null;
  readonly createdAt: number;
  readonly updatedAt: number;
}

/** What a handler hands back for the engine to store as the job's report. */
export interface ReportArtifact {
  readonly fileName: string;
  readonly content: string;
  readonly contentType: string;
}

export type ExecutionResult =
  | { readonly kind: 'success'; readonly artifact?: ReportArtifact; readonly tasksProcessed?: number }
  | { readonly kind: 'failure'; readonly reason: string };

export function success(details: { artifact?: ReportArtifact; tasksProcessed?: number } = {}): ExecutionResult {
  return { kind: 'success', ...details };
}

export function failure(reason: string): ExecutionResult {
  return { kind: 'failure', reason };
}

export interface TaskFilter {
  jobId?: string;
  status?: TaskStatus;
  excludeStatus?: TaskStatus;
}

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0 disables jitter; 0.3 spreads delays by +/-30%. */
  jitterFactor: number;
}

export type OrphanPolicy = 'reclaim' | 'manual';

export interface JobContext {
  readonly job: Job;
  readonly store: JobStore;
  readonly log: Logger;
  now(): number;
  reportProgress(percent: number): void;
}

export interface JobHandler {
  readonly type: JobType;
  /** Assigned pending tasks are held `in-progress` while the job runs. Only for handlers that change tasks. */
  readonly locksTasks?: boolean;
  execute(context: JobContext, signal: AbortSignal): Promise<ExecutionResult>;
}
