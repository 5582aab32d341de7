import type { DbClient } from './client';
import type { Task, TaskFilter, TaskStatus } from '@/lib/job-engine/types';

interface TaskRecord {
  id: string;
  title: string;
  description: string;
  status: TaskStatus;
  job_id: string | null;
  created_at: number;
  updated_at: number;
}

export interface TaskQuery extends TaskFilter {
  hasJob?: boolean;
  search?: string;
  limit?: number;
  offset?: number;
}

function recordToTask(record: TaskRecord): Task {
  return {
    id: record.id,
    title: record.title,
    description: record.description,
    status: record.status,
    jobId: record.job_id,
    createdAt: record.created_at,
    updatedAt: record.updated_at,
  };
}

export function insertTask(client: DbClient, task: Task): void {
  client.run(
    `
      INSERT INTO tasks (id, title, description, status, job_id, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `,
    [task.id, task.title, task.description, task.status, task.jobId, task.createdAt, task.updatedAt]
  );
}

export function getTaskById(client: DbClient, id: string): Task | null {
  const record = client.selectOne<TaskRecord>('SELECT * FROM tasks WHERE id = ?', [id]);
  return record ? recordToTask(record) : null;
}

export function getTasksByIds(client: DbClient, ids: readonly string[]): Task[] {
  if (ids.length === 0) return [];
  const placeholders = ids.map(() => '?').join(', ');
  return client
    .select<TaskRecord>(`SELECT * FROM tasks WHERE id IN (${placeholders}) ORDER BY created_at ASC, id ASC`, ids)
    .map(recordToTask);
}

/**
 * Tasks matching the filter, oldest first
 */
export function queryTasks(client: DbClient, filters: TaskQuery = {}): Task[] {
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (filters.jobId) {
    conditions.push('job_id = ?');
    params.push(filters.jobId);
  }

  if (filters.status) {
    conditions.push('status = ?');
    params.push(filters.status);
  }

  if (filters.excludeStatus) {
    conditions.push('status != ?');
    params.push(filters.excludeStatus);
  }

  if (filters.hasJob !== undefined) {
    conditions.push(filters.hasJob ? 'job_id IS NOT NULL' : 'job_id IS NULL');
  }

  if (filters.search) {
    conditions.push(`(title LIKE ? ESCAPE '\\' OR description LIKE ? ESCAPE '\\')`);
    const pattern = `%${filters.search.replace(/[\\%_]/g, match => `\\${match}`)}%`;
    params.push(pattern, pattern);
  }

  let query = 'SELECT * FROM tasks';
  if (conditions.length > 0) {
    query += ' WHERE ' + conditions.join(' AND ');
  }
  query += ' ORDER BY created_at ASC, id ASC';

  if (filters.limit) {
    query += ' LIMIT ?';
    params.push(filters.limit);

    if (filters.offset) {
      query += ' OFFSET ?';
      params.push(filters.offset);
    }
  }

  return client.select<TaskRecord>(query, params).map(recordToTask);
}

/**
 * Write each task's mutable fields
 * @returns number of rows changed
 */
export function updateTasks(client: DbClient, tasks: readonly Task[]): number {
  let changed = 0;
  for (const task of tasks) {
    const result = client.run(
      `
        UPDATE tasks
        SET title = ?, description = ?, status = ?, job_id = ?, updated_at = ?
        WHERE id = ?
      `,
      [task.title, task.description, task.status, task.jobId, task.updatedAt, task.id]
    );
    changed += result.changes;
  }
  return changed;
}

/**
 * Move every task of a job from one status to another
 */
export function setTaskStatusForJob(
  client: DbClient,
  jobId: string,
  from: TaskStatus,
  to: TaskStatus,
  now: number
): number {
  const result = client.run(
    'UPDATE tasks SET status = ?, updated_at = ? WHERE job_id = ? AND status = ?',
    [to, now, jobId, from]
  );
  return result.changes;
}

export function assignTasksToJob(client: DbClient, jobId: string, taskIds: readonly string[], now: number): number {
  if (taskIds.length === 0) return 0;
  const placeholders = taskIds.map(() => '?').join(', ');
  const result = client.run(
    `UPDATE tasks SET job_id = ?, updated_at = ? WHERE id IN (${placeholders})`,
    [jobId, now, ...taskIds]
  );
  return result.changes;
}

export function unassignTasksFromJob(client: DbClient, jobId: string, now: number): number {
  const result = client.run(
    'UPDATE tasks SET job_id = NULL, updated_at = ? WHERE job_id = ?',
    [now, jobId]
  );
  return result.changes;
}

export function deleteTask(client: DbClient, id: string): boolean {
  return client.run('DELETE FROM tasks WHERE id = ?', [id]).changes > 0;
}

export function countTasksByStatus(client: DbClient, status: TaskStatus): number {
  return client.selectOne<{ count: number }>(
    'SELECT COUNT(*) as count FROM tasks WHERE status = ?',
    [status]
  )?.count ?? 0;
}
