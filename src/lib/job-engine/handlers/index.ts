import type { JobHandlerRegistry } from '../handler-registry';
import { createCleanupOldJobsHandler } from './cleanup-old-jobs';
import { createGenerateTaskListHandler } from './generate-task-list';
import { createMarkTasksCompletedHandler } from './mark-tasks-completed';

export interface BuiltInHandlerOptions {
  retentionDays?: number;
}

export function registerBuiltInHandlers(
  registry: JobHandlerRegistry,
  options: BuiltInHandlerOptions = {}
): JobHandlerRegistry {
  return registry
    .register(createMarkTasksCompletedHandler())
    .register(createGenerateTaskListHandler())
    .register(createCleanupOldJobsHandler({ retentionDays: options.retentionDays }));
}

export { createCleanupOldJobsHandler, createGenerateTaskListHandler, createMarkTasksCompletedHandler };
