import type BetterSqlite3 from 'better-sqlite3';
import { DbClient } from '@/lib/db/client';
import { expireReportsBefore, getReportById, getReportByJobId, setReportStatus } from '@/lib/db/reports';
import type { Report, ReportStatus } from '@/lib/job-engine/types';
import { getLogger } from '@/lib/log/logger';

const log = getLogger({ module: 'ReportService' });

export interface ReportDto {
  id: string;
  jobId: string;
  fileName: string;
  contentType: string;
  createdAt: string;
  status: ReportStatus;
}

export interface ReportDownload {
  fileName: string;
  content: string;
  contentType: string;
}

export function toReportDto(report: Report): ReportDto {
  return {
    id: report.id,
    jobId: report.jobId,
    fileName: report.fileName,
    contentType: report.contentType,
    createdAt: new Date(report.createdAt).toISOString(),
    status: report.status,
  };
}

export class ReportService {
  private readonly client: DbClient;

  constructor(db: BetterSqlite3.Database) {
    this.client = new DbClient(db);
  }

  getReportById(id: string): ReportDto | null {
    const report = getReportById(this.client, id);
    return report ? toReportDto(report) : null;
  }

  getReportByJobId(jobId: string): ReportDto | null {
    const report = getReportByJobId(this.client, jobId);
    return report ? toReportDto(report) : null;
  }

  /**
   * Content of a report, which is then marked downloaded.
   * Expired reports are no longer served.
   */
  getReportForDownload(id: string): ReportDownload | null {
    const report = getReportById(this.client, id);
    if (!report || report.status === 'expired') {
      return null;
    }

    if (report.status !== 'downloaded') {
      setReportStatus(this.client, report.id, 'downloaded');
      log.info({ reportId: report.id, jobId: report.jobId }, 'report marked as downloaded');
    }

    return {
      fileName: report.fileName,
      content: report.content,
      contentType: report.contentType,
    };
  }

  /**
   * @returns number of reports expired
   */
  expireReportsBefore(cutoff: number): number {
    const expired = expireReportsBefore(this.client, cutoff);
    if (expired > 0) {
      log.info({ expired, cutoff: new Date(cutoff).toISOString() }, 'reports expired');
    }
    return expired;
  }
}
