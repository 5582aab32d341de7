import type BetterSqlite3 from 'better-sqlite3';
import { z } from 'zod';
import { DbClient } from '@/lib/db/client';
import {
  countTasksByStatus,
  deleteTask,
  getTaskById,
  insertTask,
  queryTasks,
  updateTasks,
} from '@/lib/db/tasks';
import { TaskLockedError } from '@/lib/errors';
import { TASK_STATUSES } from '@/lib/job-engine/types';
import type { Task, TaskStatus } from '@/lib/job-engine/types';
import { getLogger } from '@/lib/log/logger';
import { generateUUIDv7 } from '@/lib/utils/uuid';
import { parseInput } from '@/lib/validation';

const log = getLogger({ module: 'TaskService' });

export interface TaskDto {
  id: string;
  title: string;
  description: string;
  status: TaskStatus;
  createdAt: string;
  jobId: string | null;
}

export function toTaskDto(task: Task): TaskDto {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    status: task.status,
    createdAt: new Date(task.createdAt).toISOString(),
    jobId: task.jobId,
  };
}

const titleSchema = z
  .string()
  .trim()
  .min(1, 'Title is required')
  .max(200, 'Title cannot be longer than 200 characters');

const descriptionSchema = z.string().trim().max(1000, 'Description cannot be longer than 1000 characters');

// in-progress belongs to the job engine
const editableStatusSchema = z.enum(['pending', 'completed']);

const createTaskSchema = z.object({
  title: titleSchema,
  description: descriptionSchema.default(''),
});

const updateTaskSchema = z.object({
  title: titleSchema.optional(),
  description: descriptionSchema.optional(),
  status: editableStatusSchema.optional(),
});

const taskQuerySchema = z.object({
  status: z.enum(TASK_STATUSES).optional(),
  hasJob: z.boolean().optional(),
  search: z.string().trim().max(200).optional(),
  limit: z.number().int().positive().max(500).optional(),
  offset: z.number().int().min(0).optional(),
});

export type CreateTaskInput = z.input<typeof createTaskSchema>;
export type UpdateTaskInput = z.input<typeof updateTaskSchema>;
export type TaskListQuery = z.input<typeof taskQuerySchema>;

/**
 * Task CRUD. A task the job engine holds `in-progress` is read-only here.
 */
export class TaskService {
  private readonly client: DbClient;

  constructor(
    db: BetterSqlite3.Database,
    private readonly clock: () => number = Date.now
  ) {
    this.client = new DbClient(db);
  }

  createTask(input: CreateTaskInput): TaskDto {
    const values = parseInput(createTaskSchema, input);
    const now = this.clock();
    const task: Task = {
      id: generateUUIDv7(now),
      title: values.title,
      description: values.description,
      status: 'pending',
      createdAt: now,
      updatedAt: now,
      jobId: null,
    };

    insertTask(this.client, task);
    log.info({ taskId: task.id }, 'task created');
    return toTaskDto(task);
  }

  getTaskById(id: string): TaskDto | null {
    const task = getTaskById(this.client, id);
    return task ? toTaskDto(task) : null;
  }

  getTasks(query: TaskListQuery = {}): TaskDto[] {
    const filters = parseInput(taskQuerySchema, query);
    return queryTasks(this.client, filters).map(toTaskDto);
  }

  getTasksByStatus(status: TaskStatus): TaskDto[] {
    return queryTasks(this.client, { status }).map(toTaskDto);
  }

  countTasksByStatus(status: TaskStatus): number {
    return countTasksByStatus(this.client, status);
  }

  /**
   * @returns null when the task does not exist
   * @throws TaskLockedError while a job is processing the task
   */
  updateTask(id: string, input: UpdateTaskInput): TaskDto | null {
    const changes = parseInput(updateTaskSchema, input);

    return this.client.transaction(() => {
      const task = getTaskById(this.client, id);
      if (!task) {
        return null;
      }
      if (task.status === 'in-progress') {
        throw new TaskLockedError(task.id, task.status);
      }

      const updated: Task = {
        ...task,
        title: changes.title ?? task.title,
        description: changes.description ?? task.description,
        status: changes.status ?? task.status,
        updatedAt: this.clock(),
      };
      updateTasks(this.client, [updated]);
      return toTaskDto(updated);
    });
  }

  /**
   * @returns false when the task does not exist
   * @throws TaskLockedError while a job is processing the task
   */
  deleteTask(id: string): boolean {
    return this.client.transaction(() => {
      const task = getTaskById(this.client, id);
      if (!task) {
        return false;
      }
      if (task.status === 'in-progress') {
        throw new TaskLockedError(task.id, task.status);
      }

      deleteTask(this.client, id);
      log.info({ taskId: id }, 'task deleted');
      return true;
    });
  }
}
