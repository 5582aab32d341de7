/**
 * Job engine error taxonomy.
 *
 * The worker converts every per-job error into a state transition or a skip;
 * none of these is allowed to end the polling loop.
 */

import type { JobStatus } from './types';

export class JobEngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Another caller moved the job out of `queued` first. The tick is skipped. */
export class ConcurrentClaimError extends JobEngineError {
  constructor(readonly jobId: string) {
    super(`Job ${jobId} was already claimed`);
  }
}

/** An edge outside the transition table was requested. The job keeps its prior state. */
export class InvalidTransitionError extends JobEngineError {
  constructor(
    readonly jobId: string,
    readonly from: JobStatus,
    readonly to: JobStatus,
    readonly detail?: string
  ) {
    super(`Invalid transition for job ${jobId}: ${from} -> ${to}${detail ? ` (${detail})` : ''}`);
  }
}

export class UnknownJobTypeError extends JobEngineError {
  constructor(readonly jobType: string) {
    super(`Unknown job type "${jobType}"`);
  }
}

export class DuplicateHandlerError extends JobEngineError {
  constructor(readonly jobType: string) {
    super(`A handler for job type "${jobType}" is already registered`);
  }
}

/** Business failure raised by a handler; its message becomes RetryInfo.lastErrorMessage. */
export class ExecutorFailure extends JobEngineError {
  constructor(readonly reason: string, options?: { cause?: unknown }) {
    super(reason, options);
  }
}

export class DuplicateReportError extends JobEngineError {
  constructor(readonly jobId: string, options?: { cause?: unknown }) {
    super(`Job ${jobId} already has a report`, options);
  }
}

/** The persistence layer could not be reached; nothing from the tick was committed. */
export class StoreUnavailableError extends JobEngineError {
  constructor(readonly operation: string, options?: { cause?: unknown }) {
    super(`Job store unavailable during ${operation}`, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
