// Job status notifications for a presentation layer to subscribe to
import { EventEmitter } from 'events';
import { getLogger } from '@/lib/log/logger';
import type { JobStatus } from './types';

const log = getLogger({ module: 'JobStatusNotifier' });

export interface JobStatusChangedEvent {
  jobId: string;
  jobType: string;
  status: JobStatus;
  updatedAt: string;
  errorMessage?: string;
}

export interface JobProgressEvent {
  jobId: string;
  progress: number;
  updatedAt: string;
}

export interface ReportGeneratedEvent {
  jobId: string;
  reportId: string;
  fileName: string;
  updatedAt: string;
}

export interface JobEventMap {
  'job-status-changed': JobStatusChangedEvent;
  'job-progress': JobProgressEvent;
  'report-generated': ReportGeneratedEvent;
}

export type JobEventType = keyof JobEventMap;

/**
 * What the engine publishes to. Implementations must not throw.
 */
export interface JobNotifier {
  notify<K extends JobEventType>(type: K, event: JobEventMap[K]): void;
}

/**
 * In-process pub/sub over EventEmitter. A failing listener is logged and
 * does not stop delivery to the others.
 */
export class JobStatusNotifier extends EventEmitter implements JobNotifier {
  constructor() {
    super();
    // One listener per connected client
    this.setMaxListeners(100);
  }

  notify<K extends JobEventType>(type: K, event: JobEventMap[K]): void {
    log.debug({ type, event }, 'broadcasting job event');
    try {
      this.emit(type, event);
    } catch (error) {
      log.error({ err: error, type }, 'job event delivery failed');
    }
  }

  /**
   * Returns unsubscribe function
   */
  subscribe<K extends JobEventType>(
    type: K,
    listener: (event: JobEventMap[K]) => void | Promise<void>
  ): () => void {
    const guarded = (event: JobEventMap[K]): void => {
      try {
        const result = listener(event);
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            log.error({ err: error, type }, 'job event listener failed');
          });
        }
      } catch (error) {
        log.error({ err: error, type }, 'job event listener failed');
      }
    };

    this.on(type, guarded);
    return () => {
      this.off(type, guarded);
    };
  }

  getSubscriberCount(type?: JobEventType): number {
    if (type) return this.listenerCount(type);
    return this.eventNames().reduce((count, name) => count + this.listenerCount(name), 0);
  }
}
