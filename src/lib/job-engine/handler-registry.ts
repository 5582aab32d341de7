import { DuplicateHandlerError, UnknownJobTypeError } from './errors';
import { isJobType } from './types';
import type { JobHandler, JobType } from './types';
import { getLogger } from '@/lib/log/logger';

const log = getLogger({ module: 'JobHandlerRegistry' });

/**
 * Handlers keyed by job type. Keys outside JOB_TYPES are rejected when a
 * handler is registered; a stored job naming an unknown type fails at
 * dispatch instead.
 */
export class JobHandlerRegistry {
  private readonly handlers = new Map<JobType, JobHandler>();

  register(handler: JobHandler): this {
    if (!isJobType(handler.type)) {
      throw new UnknownJobTypeError(handler.type);
    }
    if (this.handlers.has(handler.type)) {
      throw new DuplicateHandlerError(handler.type);
    }

    this.handlers.set(handler.type, handler);
    log.info({ type: handler.type }, 'job handler registered');
    return this;
  }

  /**
   * @throws UnknownJobTypeError
   */
  resolve(jobType: string): JobHandler {
    const handler = isJobType(jobType) ? this.handlers.get(jobType) : undefined;
    if (!handler) {
      throw new UnknownJobTypeError(jobType);
    }
    return handler;
  }

  has(jobType: string): boolean {
    return isJobType(jobType) && this.handlers.has(jobType);
  }

  types(): JobType[] {
    return Array.from(this.handlers.keys());
  }
}
