import { success } from '../types';
import type { JobHandler } from '../types';

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_RETENTION_DAYS = 30;

/**
 * Deletes completed jobs created more than `retentionDays` ago. Their
 * reports and retry records go with them; their tasks are unassigned.
 */
export function createCleanupOldJobsHandler(
  options: { retentionDays?: number } = {}
): JobHandler {
  const retentionDays = options.retentionDays ?? DEFAULT_RETENTION_DAYS;

  return {
    type: 'cleanup-old-jobs',

    async execute({ job, store, log, now, reportProgress }, signal) {
      signal.throwIfAborted();

      const cutoff = now() - retentionDays * DAY_MS;
      const deleted = store.deleteCompletedJobsBefore(cutoff, job.id);
      reportProgress(100);

      log.info({ deleted, retentionDays }, 'old jobs cleaned up');
      return success();
    },
  };
}
