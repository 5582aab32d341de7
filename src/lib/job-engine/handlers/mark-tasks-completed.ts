import { success } from '../types';
import type { JobHandler, Task } from '../types';

/**
 * Completes the tasks assigned to the job, or every task when none are
 * assigned. Tasks already completed are left alone, so a rerun is a no-op.
 */
export function createMarkTasksCompletedHandler(): JobHandler {
  return {
    type: 'mark-tasks-completed',
    locksTasks: true,

    async execute({ job, store, log, now, reportProgress }, signal) {
      signal.throwIfAborted();

      const assigned = store.listTasks({ jobId: job.id });
      const scope = assigned.length > 0 ? assigned : store.listTasks();
      const targets = scope.filter(task => task.status !== 'completed');

      if (targets.length === 0) {
        log.warn({}, 'no open tasks to complete');
        reportProgress(100);
        return success({ tasksProcessed: 0 });
      }

      const timestamp = now();
      const completed = targets.map((task): Task => ({
        ...task,
        status: 'completed',
        updatedAt: timestamp,
      }));

      signal.throwIfAborted();
      const changed = store.updateTasks(completed);
      reportProgress(100);

      log.info({ tasksProcessed: changed }, 'tasks marked completed');
      return success({ tasksProcessed: changed });
    },
  };
}
