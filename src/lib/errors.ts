import type { ZodIssue } from 'zod';

/**
 * Errors raised by the task, job and report services and by configuration loading.
 */
export class AppError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, readonly issues: readonly ZodIssue[] = []) {
    super(message);
  }

  static fromIssues(issues: readonly ZodIssue[]): ValidationError {
    const summary = issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return new ValidationError(summary || 'Invalid input', issues);
  }
}

export class TaskLockedError extends AppError {
  constructor(readonly taskId: string, readonly status: string) {
    super(`Task ${taskId} is ${status} and cannot be modified`);
  }
}

export class JobNotEditableError extends AppError {
  constructor(readonly jobId: string, readonly status: string) {
    super(`Cannot modify a ${status} job. Only queued jobs can be edited or deleted.`);
  }
}

/** Fatal at startup. */
export class ConfigurationError extends AppError {}
