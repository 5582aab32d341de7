/**
 * Worker - Background job processing with polling
 *
 * One job at a time: each tick claims at most one eligible job and runs it to
 * completion before the next tick is scheduled.
 */

import { hostname } from 'os';
import { getLogger } from '@/lib/log/logger';
import { ConcurrentClaimError, InvalidTransitionError, StoreUnavailableError } from './errors';
import type { JobHandlerRegistry } from './handler-registry';
import type { JobStore } from './job-store';
import { JobRunner, STALE_JOB_REASON } from './job-runner';
import type { JobNotifier } from './notifier';
import { RetryTracker } from './retry-tracker';
import type { Job, OrphanPolicy, RetryPolicy } from './types';

export interface WorkerConfig {
  /** Polling interval in milliseconds (default: 10000ms) */
  pollIntervalMs?: number;

  /** Upper bound on a single job execution (default: 300000ms = 5 minutes) */
  jobTimeoutMs?: number;

  /** A running job started longer ago than this is orphaned (default: 600000ms = 10 minutes) */
  staleJobTimeoutMs?: number;

  /** Stale job recovery interval (default: 60000ms = 1 minute) */
  staleJobRecoveryIntervalMs?: number;

  /** What to do with orphaned running jobs (default: reclaim) */
  orphanPolicy?: OrphanPolicy;
}

export interface JobWorkerOptions extends WorkerConfig {
  store: JobStore;
  registry: JobHandlerRegistry;
  notifier?: JobNotifier;
  retryPolicy?: RetryPolicy;
  workerId?: string;
  clock?: () => number;
}

export type TickSkipReason =
  | 'paused'
  | 'shut-down'
  | 'busy'
  | 'claim-conflict'
  | 'store-unavailable'
  | 'invalid-transition';

export type TickResult =
  | { kind: 'idle' }
  | { kind: 'skipped'; reason: TickSkipReason }
  | { kind: 'processed'; job: Job };

export interface WorkerStatus {
  workerId: string;
  running: boolean;
  paused: boolean;
  stopping: boolean;
  currentJobId: string | null;
  processedCount: number;
  lastTickAt: number | null;
}

export function defaultWorkerId(): string {
  return `${hostname()}:${process.pid}`;
}

export class JobWorker {
  private config: Required<WorkerConfig>;
  private readonly store: JobStore;
  private readonly runner: JobRunner;
  private readonly workerId: string;
  private readonly clock: () => number;
  private running = false;
  private paused = false;
  private stopping = false;
  private pollTimer: NodeJS.Timeout | null = null;
  private staleRecoveryTimer: NodeJS.Timeout | null = null;
  private abortController = new AbortController();
  private activeTick: Promise<TickResult> | null = null;
  private currentJobId: string | null = null;
  private processedCount = 0;
  private lastTickAt: number | null = null;
  private logger = getLogger({ module: 'JobWorker' });

  constructor(options: JobWorkerOptions) {
    this.config = {
      pollIntervalMs: options.pollIntervalMs ?? 10_000,
      jobTimeoutMs: options.jobTimeoutMs ?? 300_000,
      staleJobTimeoutMs: options.staleJobTimeoutMs ?? 600_000,
      staleJobRecoveryIntervalMs: options.staleJobRecoveryIntervalMs ?? 60_000,
      orphanPolicy: options.orphanPolicy ?? 'reclaim',
    };
    this.store = options.store;
    this.workerId = options.workerId ?? defaultWorkerId();
    this.clock = options.clock ?? Date.now;
    this.runner = new JobRunner({
      store: options.store,
      registry: options.registry,
      retryTracker: new RetryTracker(options.store, options.retryPolicy),
      notifier: options.notifier,
      workerId: this.workerId,
      jobTimeoutMs: this.config.jobTimeoutMs,
      clock: this.clock,
    });
  }

  /**
   * Start the worker
   */
  start(): void {
    if (this.running) {
      this.logger.debug({}, 'worker already running');
      return;
    }

    this.running = true;
    this.paused = false;
    this.stopping = false;
    if (this.abortController.signal.aborted) {
      this.abortController = new AbortController();
    }
    this.logger.info({ workerId: this.workerId, pollIntervalMs: this.config.pollIntervalMs }, 'worker started');

    this.schedulePoll();
    this.scheduleStaleRecovery();
  }

  /**
   * Stop scheduling ticks. A tick already in flight runs to completion.
   */
  stop(): void {
    if (!this.running) {
      this.logger.debug({}, 'worker not running');
      return;
    }

    this.running = false;
    this.paused = false;

    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = null;
    }

    if (this.staleRecoveryTimer) {
      clearTimeout(this.staleRecoveryTimer);
      this.staleRecoveryTimer = null;
    }

    this.logger.info({}, 'worker stopped');
  }

  /**
   * Stop, cancel the job in flight, and wait for its tick to settle (with timeout).
   * A cancelled job is failed and routed through the retry path.
   */
  async shutdown(options?: { timeoutMs?: number; reason?: string }): Promise<void> {
    if (this.stopping) {
      return;
    }

    this.stopping = true;
    this.logger.info({ reason: options?.reason }, 'worker shutting down');
    this.stop();
    this.abortController.abort(options?.reason ?? 'shutdown');

    const active = this.activeTick;
    if (!active) {
      this.logger.info({}, 'worker shutdown complete (no active job)');
      this.stopping = false;
      return;
    }

    const settled = await this.waitFor(active, options?.timeoutMs ?? 10_000);
    if (settled) {
      this.logger.info({}, 'worker shutdown complete');
    } else {
      this.logger.warn({ jobId: this.currentJobId }, 'worker shutdown timed out while waiting for job');
    }
    this.stopping = false;
  }

  /**
   * Pause the worker (ticks become no-ops but timers keep running)
   */
  pause(): void {
    if (!this.running) {
      this.logger.debug({}, 'worker not running, cannot pause');
      return;
    }

    this.paused = true;
    this.logger.info({}, 'worker paused');
  }

  /**
   * Resume the worker
   */
  resume(): void {
    if (!this.running) {
      this.logger.debug({}, 'worker not running, cannot resume');
      return;
    }

    if (!this.paused) {
      this.logger.debug({}, 'worker not paused');
      return;
    }

    this.paused = false;
    this.logger.info({}, 'worker resumed');
  }

  isRunning(): boolean {
    return this.running;
  }

  isPaused(): boolean {
    return this.paused;
  }

  getStatus(): WorkerStatus {
    return {
      workerId: this.workerId,
      running: this.running,
      paused: this.paused,
      stopping: this.stopping,
      currentJobId: this.currentJobId,
      processedCount: this.processedCount,
      lastTickAt: this.lastTickAt,
    };
  }

  /**
   * Claim and process at most one job. Never throws for a per-job error.
   */
  async tick(): Promise<TickResult> {
    if (this.paused || this.stopping) {
      return { kind: 'skipped', reason: 'paused' };
    }
    // Cancelled until the next start()
    if (this.abortController.signal.aborted) {
      return { kind: 'skipped', reason: 'shut-down' };
    }
    if (this.activeTick) {
      return { kind: 'skipped', reason: 'busy' };
    }

    const tick = this.processNext();
    this.activeTick = tick;
    try {
      return await tick;
    } finally {
      this.activeTick = null;
      this.lastTickAt = this.clock();
    }
  }

  /**
   * Fail orphaned running jobs and route them through the retry path.
   * Without `startedBefore` every running job is treated as orphaned, which
   * only holds at startup before this worker has claimed anything.
   * @returns number of jobs recovered
   */
  recoverOrphanedJobs(startedBefore?: number): number {
    const orphans = this.store
      .findRunningJobs(startedBefore)
      .filter(job => job.id !== this.currentJobId);

    if (orphans.length === 0) {
      return 0;
    }

    if (this.config.orphanPolicy === 'manual') {
      this.logger.warn(
        { jobIds: orphans.map(job => job.id) },
        'orphaned running jobs left for manual intervention'
      );
      return 0;
    }

    let recovered = 0;
    for (const orphan of orphans) {
      try {
        this.runner.recover(orphan, STALE_JOB_REASON);
        recovered++;
      } catch (error) {
        if (error instanceof StoreUnavailableError) throw error;
        this.logger.error({ err: error, jobId: orphan.id }, 'orphaned job recovery failed');
      }
    }

    this.logger.info({ recovered }, 'orphaned jobs recovered');
    return recovered;
  }

  /**
   * Fail one running job by id and route it through the retry path, for
   * orphans left behind under the manual policy.
   * @returns the job as persisted, or null when no such job is running
   */
  recoverJob(jobId: string, reason: string = STALE_JOB_REASON): Job | null {
    if (jobId === this.currentJobId) {
      this.logger.warn({ jobId }, 'refusing to recover the job this worker is executing');
      return null;
    }
    const orphan = this.store.getJob(jobId);
    if (!orphan || orphan.status !== 'running') {
      return null;
    }
    return this.runner.recover(orphan, reason);
  }

  private async processNext(): Promise<TickResult> {
    let claimed: Job | null;
    try {
      claimed = this.store.claimNextEligibleJob(this.workerId, this.clock());
    } catch (error) {
      if (error instanceof ConcurrentClaimError) {
        this.logger.debug({ jobId: error.jobId }, 'job claimed elsewhere, skipping tick');
        return { kind: 'skipped', reason: 'claim-conflict' };
      }
      if (error instanceof StoreUnavailableError) {
        this.logger.warn({ err: error }, 'job store unavailable, skipping tick');
        return { kind: 'skipped', reason: 'store-unavailable' };
      }
      throw error;
    }

    if (!claimed) {
      this.warnIfBlocked();
      return { kind: 'idle' };
    }

    this.currentJobId = claimed.id;
    try {
      const job = await this.runner.run(claimed, this.abortController.signal);
      this.processedCount++;
      return { kind: 'processed', job };
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        this.logger.warn({ err: error, jobId: claimed.id }, 'job store unavailable, job left running');
        return { kind: 'skipped', reason: 'store-unavailable' };
      }
      if (error instanceof InvalidTransitionError) {
        this.logger.error({ err: error, jobId: claimed.id }, 'invalid job transition');
        return { kind: 'skipped', reason: 'invalid-transition' };
      }
      throw error;
    } finally {
      this.currentJobId = null;
    }
  }

  /** A running job nobody executes holds up every claim. */
  private warnIfBlocked(): void {
    let blocking: Job[];
    try {
      blocking = this.store.findRunningJobs();
    } catch (error) {
      this.logger.warn({ err: error }, 'could not look up running jobs');
      return;
    }
    if (blocking.length === 0) {
      this.logger.debug({}, 'no eligible jobs');
      return;
    }
    this.logger.warn(
      { jobIds: blocking.map(job => job.id), orphanPolicy: this.config.orphanPolicy },
      'claims blocked by a running job'
    );
  }

  /**
   * Schedule next poll
   */
  private schedulePoll(): void {
    if (!this.running || this.stopping) return;

    this.pollTimer = setTimeout(() => {
      void this.poll();
    }, this.config.pollIntervalMs);
  }

  /**
   * Schedule next stale recovery
   */
  private scheduleStaleRecovery(): void {
    if (!this.running || this.stopping) return;

    this.staleRecoveryTimer = setTimeout(() => {
      this.recoverStale();
    }, this.config.staleJobRecoveryIntervalMs);
  }

  private async poll(): Promise<void> {
    try {
      const result = await this.tick();
      if (result.kind === 'processed') {
        this.logger.info({ jobId: result.job.id, status: result.job.status }, 'tick processed job');
      }
    } catch (error) {
      this.logger.error({ err: error }, 'worker poll error');
    } finally {
      this.schedulePoll();
    }
  }

  private recoverStale(): void {
    try {
      if (this.paused || this.stopping) {
        return;
      }
      this.recoverOrphanedJobs(this.clock() - this.config.staleJobTimeoutMs);
    } catch (error) {
      this.logger.error({ err: error }, 'stale recovery error');
    } finally {
      this.scheduleStaleRecovery();
    }
  }

  private async waitFor(promise: Promise<unknown>, timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>(resolve => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([
        promise.then(
          () => true,
          () => true
        ),
        timedOut,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
