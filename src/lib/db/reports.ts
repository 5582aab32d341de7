import type { DbClient } from './client';
import type { Report, ReportStatus } from '@/lib/job-engine/types';

interface ReportRecord {
  id: string;
  job_id: string;
  file_name: string;
  content: string;
  content_type: string;
  status: ReportStatus;
  created_at: number;
}

function recordToReport(record: ReportRecord): Report {
  return {
    id: record.id,
    jobId: record.job_id,
    fileName: record.file_name,
    content: record.content,
    contentType: record.content_type,
    status: record.status,
    createdAt: record.created_at,
  };
}

/**
 * Insert a report. The UNIQUE(job_id) constraint rejects a second report for a job.
 */
export function insertReport(client: DbClient, report: Report): void {
  client.run(
    `
      INSERT INTO reports (id, job_id, file_name, content, content_type, status, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `,
    [
      report.id,
      report.jobId,
      report.fileName,
      report.content,
      report.contentType,
      report.status,
      report.createdAt,
    ]
  );
}

export function getReportById(client: DbClient, id: string): Report | null {
  const record = client.selectOne<ReportRecord>('SELECT * FROM reports WHERE id = ?', [id]);
  return record ? recordToReport(record) : null;
}

export function getReportByJobId(client: DbClient, jobId: string): Report | null {
  const record = client.selectOne<ReportRecord>('SELECT * FROM reports WHERE job_id = ?', [jobId]);
  return record ? recordToReport(record) : null;
}

export function setReportStatus(client: DbClient, id: string, status: ReportStatus): boolean {
  return client.run('UPDATE reports SET status = ? WHERE id = ?', [status, id]).changes > 0;
}

/**
 * Mark reports created before the cutoff as expired
 */
export function expireReportsBefore(client: DbClient, cutoff: number): number {
  const result = client.run(
    `UPDATE reports SET status = 'expired' WHERE status != 'expired' AND created_at < ?`,
    [cutoff]
  );
  return result.changes;
}
