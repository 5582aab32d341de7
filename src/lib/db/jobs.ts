import type { DbClient } from './client';
import type { Job, JobStatus } from '@/lib/job-engine/types';

interface JobRecord {
  id: string;
  job_type: string;
  status: JobStatus;
  version: number;
  claimed_by: string | null;
  started_at: number | null;
  finished_at: number | null;
  scheduled_at: number | null;
  created_at: number;
  updated_at: number;
}

export interface JobListFilters {
  status?: JobStatus;
  jobType?: string;
  limit?: number;
  offset?: number;
}

/**
 * Convert database record to Job
 */
function recordToJob(record: JobRecord): Job {
  return {
    id: record.id,
    jobType: record.job_type,
    status: record.status,
    version: record.version,
    claimedBy: record.claimed_by,
    startedAt: record.started_at,
    finishedAt: record.finished_at,
    scheduledAt: record.scheduled_at,
    createdAt: record.created_at,
    updatedAt: record.updated_at,
  };
}

function jobParams(job: Job): unknown[] {
  return [
    job.id,
    job.jobType,
    job.status,
    job.version,
    job.claimedBy,
    job.startedAt,
    job.finishedAt,
    job.scheduledAt,
    job.createdAt,
    job.updatedAt,
  ];
}

export function insertJob(client: DbClient, job: Job): void {
  client.run(
    `
      INSERT INTO jobs (
        id, job_type, status, version, claimed_by, started_at,
        finished_at, scheduled_at, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `,
    jobParams(job)
  );
}

/**
 * Insert or overwrite a job. An existing row with a newer version, or with
 * the same version but different state, is left alone.
 * @returns true if the row now holds this value
 */
export function upsertJob(client: DbClient, job: Job): boolean {
  const result = client.run(
    `
      INSERT INTO jobs (
        id, job_type, status, version, claimed_by, started_at,
        finished_at, scheduled_at, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        job_type = excluded.job_type,
        status = excluded.status,
        version = excluded.version,
        claimed_by = excluded.claimed_by,
        started_at = excluded.started_at,
        finished_at = excluded.finished_at,
        scheduled_at = excluded.scheduled_at,
        updated_at = excluded.updated_at
      WHERE jobs.version < excluded.version
        OR (
          jobs.version = excluded.version
          AND jobs.status = excluded.status
          AND jobs.claimed_by IS excluded.claimed_by
          AND jobs.started_at IS excluded.started_at
          AND jobs.finished_at IS excluded.finished_at
          AND jobs.scheduled_at IS excluded.scheduled_at
        )
    `,
    jobParams(job)
  );
  return result.changes > 0;
}

/**
 * Write `job` only if the stored row still has the expected version and status.
 * @returns false on a lost race
 */
export function compareAndSwapJob(
  client: DbClient,
  job: Job,
  expected: { version: number; status: JobStatus }
): boolean {
  const result = client.run(
    `
      UPDATE jobs
      SET status = ?, version = ?, claimed_by = ?, started_at = ?,
          finished_at = ?, scheduled_at = ?, updated_at = ?
      WHERE id = ? AND version = ? AND status = ?
    `,
    [
      job.status,
      job.version,
      job.claimedBy,
      job.startedAt,
      job.finishedAt,
      job.scheduledAt,
      job.updatedAt,
      job.id,
      expected.version,
      expected.status,
    ]
  );
  return result.changes > 0;
}

export function getJobById(client: DbClient, id: string): Job | null {
  const record = client.selectOne<JobRecord>('SELECT * FROM jobs WHERE id = ?', [id]);
  return record ? recordToJob(record) : null;
}

/**
 * Oldest queued job whose schedule has passed, unless another job is running
 */
export function selectNextEligibleJob(client: DbClient, now: number): Job | null {
  const record = client.selectOne<JobRecord>(
    `
      SELECT *
      FROM jobs
      WHERE status = 'queued'
        AND (scheduled_at IS NULL OR scheduled_at <= ?)
        AND NOT EXISTS (SELECT 1 FROM jobs AS active WHERE active.status = 'running')
      ORDER BY created_at ASC, id ASC
      LIMIT 1
    `,
    [now]
  );
  return record ? recordToJob(record) : null;
}

/**
 * Jobs in `running`, optionally only those started before a cutoff
 */
export function getRunningJobs(client: DbClient, startedBefore?: number): Job[] {
  if (startedBefore === undefined) {
    return client
      .select<JobRecord>(`SELECT * FROM jobs WHERE status = 'running' ORDER BY started_at ASC`)
      .map(recordToJob);
  }

  return client
    .select<JobRecord>(
      `
        SELECT *
        FROM jobs
        WHERE status = 'running'
          AND (started_at IS NULL OR started_at < ?)
        ORDER BY started_at ASC
      `,
      [startedBefore]
    )
    .map(recordToJob);
}

export function listJobs(client: DbClient, filters?: JobListFilters): Job[] {
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (filters?.status) {
    conditions.push('status = ?');
    params.push(filters.status);
  }

  if (filters?.jobType) {
    conditions.push('job_type = ?');
    params.push(filters.jobType);
  }

  let query = 'SELECT * FROM jobs';
  if (conditions.length > 0) {
    query += ' WHERE ' + conditions.join(' AND ');
  }
  query += ' ORDER BY created_at DESC, id DESC';

  if (filters?.limit) {
    query += ' LIMIT ?';
    params.push(filters.limit);

    if (filters.offset) {
      query += ' OFFSET ?';
      params.push(filters.offset);
    }
  }

  return client.select<JobRecord>(query, params).map(recordToJob);
}

export function deleteJob(client: DbClient, id: string): boolean {
  return client.run('DELETE FROM jobs WHERE id = ?', [id]).changes > 0;
}

/**
 * Remove completed jobs created before the cutoff
 */
export function deleteCompletedJobsBefore(client: DbClient, cutoff: number, excludeJobId?: string): number {
  const result = client.run(
    `
      DELETE FROM jobs
      WHERE status = 'completed'
        AND created_at < ?
        AND id != ?
    `,
    [cutoff, excludeJobId ?? '']
  );
  return result.changes;
}

export function countJobsByStatus(client: DbClient): Record<JobStatus, number> {
  const rows = client.select<{ status: JobStatus; count: number }>(
    'SELECT status, COUNT(*) as count FROM jobs GROUP BY status'
  );

  const counts: Record<JobStatus, number> = {
    queued: 0,
    running: 0,
    completed: 0,
    failed: 0,
  };
  rows.forEach(row => {
    counts[row.status] = row.count;
  });
  return counts;
}
