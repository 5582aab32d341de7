import { success } from '../types';
import type { JobHandler, Task } from '../types';

export const TASK_LIST_CONTENT_TYPE = 'text/plain';

export function formatTaskLine(task: Task): string {
  return `Task: ${task.title}, Status: ${task.status}, Created: ${new Date(task.createdAt).toISOString()}`;
}

/**
 * TaskList_<yyyyMMddHHmmss>.txt, in UTC
 */
export function taskListFileName(now: number): string {
  const stamp = new Date(now).toISOString().slice(0, 19).replace(/[-:T]/g, '');
  return `TaskList_${stamp}.txt`;
}

/**
 * Snapshot of every task, oldest first, one line each
 */
export function createGenerateTaskListHandler(): JobHandler {
  return {
    type: 'generate-task-list',

    async execute({ store, log, now, reportProgress }, signal) {
      signal.throwIfAborted();

      const tasks = store.listTasks();
      reportProgress(50);

      const content = tasks.map(formatTaskLine).join('\n');
      const fileName = taskListFileName(now());

      signal.throwIfAborted();
      reportProgress(100);
      log.info({ fileName, taskCount: tasks.length }, 'task list generated');

      return success({
        tasksProcessed: tasks.length,
        artifact: { fileName, content, contentType: TASK_LIST_CONTENT_TYPE },
      });
    },
  };
}
