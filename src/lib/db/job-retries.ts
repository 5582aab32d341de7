import type { DbClient } from './client';
import type { RetryInfo } from '@/lib/job-engine/types';

interface RetryInfoRecord {
  job_id: string;
  retry_count: number;
  max_retries: number;
  next_retry_at: number | null;
  last_error_message: string | null;
  created_at: number;
  updated_at: number;
}

function recordToRetryInfo(record: RetryInfoRecord): RetryInfo {
  return {
    jobId: record.job_id,
    retryCount: record.retry_count,
    maxRetries: record.max_retries,
    nextRetryAt: record.next_retry_at,
    lastErrorMessage: record.last_error_message,
    createdAt: record.created_at,
    updatedAt: record.updated_at,
  };
}

export function getRetryInfo(client: DbClient, jobId: string): RetryInfo | null {
  const record = client.selectOne<RetryInfoRecord>('SELECT * FROM job_retries WHERE job_id = ?', [jobId]);
  return record ? recordToRetryInfo(record) : null;
}

export function upsertRetryInfo(client: DbClient, info: RetryInfo): void {
  client.run(
    `
      INSERT INTO job_retries (
        job_id, retry_count, max_retries, next_retry_at,
        last_error_message, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(job_id) DO UPDATE SET
        retry_count = excluded.retry_count,
        max_retries = excluded.max_retries,
        next_retry_at = excluded.next_retry_at,
        last_error_message = excluded.last_error_message,
        updated_at = excluded.updated_at
    `,
    [
      info.jobId,
      info.retryCount,
      info.maxRetries,
      info.nextRetryAt,
      info.lastErrorMessage,
      info.createdAt,
      info.updatedAt,
    ]
  );
}

export function deleteRetryInfo(client: DbClient, jobId: string): boolean {
  return client.run('DELETE FROM job_retries WHERE job_id = ?', [jobId]).changes > 0;
}
