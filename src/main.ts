/**
 * Job worker process entry point
 */

import { loadEngineSettings } from '@/lib/config/settings';
import { closeDatabase, openDataDirectory } from '@/lib/db/connection';
import { ConfigurationError } from '@/lib/errors';
import { createJobEngine, registerShutdownHooks, startJobEngine } from '@/lib/job-engine/startup';
import { getLogger, setLogLevel } from '@/lib/log/logger';
import { acquireProcessLock, getLocksDir, releaseProcessLock } from '@/lib/utils/process-lock';

const log = getLogger({ module: 'Main' });

async function main(): Promise<void> {
  const settings = loadEngineSettings();
  if (settings.logLevel) {
    setLogLevel(settings.logLevel);
  }

  const lock = await acquireProcessLock(getLocksDir(settings.dataDir), 'job-worker');
  if (!lock.acquired) {
    log.error({ lockPath: lock.lockPath, ownerPid: lock.ownerPid }, 'another job worker is running');
    process.exitCode = 1;
    return;
  }

  const db = openDataDirectory(settings.dataDir);
  const engine = createJobEngine({ db, settings });

  engine.notifier.subscribe('job-status-changed', event => {
    log.debug({ event }, 'job status changed');
  });

  registerShutdownHooks(engine, async () => {
    closeDatabase(db);
    await releaseProcessLock(lock.lockPath);
  });
  startJobEngine(engine);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    log.error({ message: error.message }, 'invalid configuration');
  } else {
    log.error({ err: error }, 'job worker failed to start');
  }
  process.exit(1);
});
