/**
 * Job engine startup - wire store, handlers and worker, recover orphans,
 * and drain on process signals
 */

import type BetterSqlite3 from 'better-sqlite3';
import type { EngineSettings } from '@/lib/config/settings';
import { getLogger } from '@/lib/log/logger';
import { JobHandlerRegistry } from './handler-registry';
import { registerBuiltInHandlers } from './handlers';
import { SqliteJobStore } from './job-store';
import { JobStatusNotifier } from './notifier';
import { JobWorker } from './worker';

const log = getLogger({ module: 'JobEngineStartup' });

export interface JobEngine {
  store: SqliteJobStore;
  registry: JobHandlerRegistry;
  notifier: JobStatusNotifier;
  worker: JobWorker;
  settings: EngineSettings;
}

export interface CreateJobEngineOptions {
  db: BetterSqlite3.Database;
  settings: EngineSettings;
  notifier?: JobStatusNotifier;
  workerId?: string;
  clock?: () => number;
}

export function createJobEngine(options: CreateJobEngineOptions): JobEngine {
  const { settings } = options;
  const store = new SqliteJobStore(options.db);
  const registry = registerBuiltInHandlers(new JobHandlerRegistry(), {
    retentionDays: settings.retentionDays,
  });
  const notifier = options.notifier ?? new JobStatusNotifier();

  const worker = new JobWorker({
    store,
    registry,
    notifier,
    retryPolicy: settings.retry,
    pollIntervalMs: settings.pollIntervalMs,
    jobTimeoutMs: settings.jobTimeoutMs,
    staleJobTimeoutMs: settings.staleJobTimeoutMs,
    staleJobRecoveryIntervalMs: settings.staleJobRecoveryIntervalMs,
    orphanPolicy: settings.orphanPolicy,
    workerId: options.workerId,
    clock: options.clock,
  });

  return { store, registry, notifier, worker, settings };
}

/**
 * Recover jobs a previous process left running, then start polling.
 * @returns number of orphaned jobs recovered
 */
export function startJobEngine(engine: JobEngine): number {
  log.info({ handlers: engine.registry.types() }, 'initializing');

  // Nothing has been claimed yet, so every running job is an orphan
  const recovered = engine.worker.recoverOrphanedJobs();
  engine.worker.start();

  log.info({ recovered }, 'initialization complete');
  return recovered;
}

/**
 * Drain the worker on SIGINT/SIGTERM, run `onDrained`, then exit.
 * @returns function removing the hooks
 */
export function registerShutdownHooks(
  engine: JobEngine,
  onDrained: () => Promise<void> = async () => {}
): () => void {
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  let draining = false;

  const handler = (signal: NodeJS.Signals): void => {
    if (draining) return;
    draining = true;
    log.info({ signal }, 'received shutdown signal, draining job worker');

    engine.worker
      .shutdown({ reason: `signal:${signal}`, timeoutMs: engine.settings.shutdownTimeoutMs })
      .then(onDrained)
      .then(() => {
        log.info({ signal }, 'job worker drained, exiting');
        process.exit(0);
      })
      .catch((error: unknown) => {
        log.error({ err: error, signal }, 'shutdown failed');
        process.exit(1);
      });
  };

  signals.forEach(signal => process.on(signal, handler));
  return () => {
    signals.forEach(signal => process.off(signal, handler));
  };
}
