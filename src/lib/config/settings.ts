// Engine settings read from the environment
import { z } from 'zod';
import { ConfigurationError } from '@/lib/errors';
import type { LogLevel } from '@/lib/log/logger';
import { MAX_JITTER_FACTOR } from '@/lib/job-engine/retry-tracker';
import type { OrphanPolicy, RetryPolicy } from '@/lib/job-engine/types';

export interface EngineSettings {
  dataDir: string;
  pollIntervalMs: number;
  jobTimeoutMs: number;
  retry: RetryPolicy;
  staleJobTimeoutMs: number;
  staleJobRecoveryIntervalMs: number;
  orphanPolicy: OrphanPolicy;
  retentionDays: number;
  shutdownTimeoutMs: number;
  logLevel?: LogLevel;
}

const positiveMs = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z
  .object({
    TASKBOARD_DATA_DIR: z.string().min(1).default('./data'),
    JOB_POLL_INTERVAL_MS: positiveMs(10_000),
    JOB_TIMEOUT_MS: positiveMs(300_000),
    JOB_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
    JOB_RETRY_BASE_DELAY_MS: positiveMs(10_000),
    JOB_RETRY_MAX_DELAY_MS: positiveMs(600_000),
    JOB_RETRY_JITTER: z.coerce.number().min(0).max(MAX_JITTER_FACTOR).default(0.1),
    JOB_STALE_TIMEOUT_MS: positiveMs(600_000),
    JOB_STALE_RECOVERY_INTERVAL_MS: positiveMs(60_000),
    JOB_ORPHAN_POLICY: z.enum(['reclaim', 'manual']).default('reclaim'),
    JOB_RETENTION_DAYS: z.coerce.number().int().positive().default(30),
    SHUTDOWN_TIMEOUT_MS: positiveMs(10_000),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  })
  .refine(env => env.JOB_RETRY_MAX_DELAY_MS >= env.JOB_RETRY_BASE_DELAY_MS, {
    message: 'must not be smaller than JOB_RETRY_BASE_DELAY_MS',
    path: ['JOB_RETRY_MAX_DELAY_MS'],
  })
  .refine(env => env.JOB_STALE_TIMEOUT_MS > env.JOB_TIMEOUT_MS, {
    message: 'must be greater than JOB_TIMEOUT_MS',
    path: ['JOB_STALE_TIMEOUT_MS'],
  });

/**
 * Blank variables count as unset
 */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      values[key] = value.trim();
    }
  }
  return values;
}

/**
 * @throws ConfigurationError listing every invalid variable
 */
export function loadEngineSettings(env: NodeJS.ProcessEnv = process.env): EngineSettings {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    dataDir: values.TASKBOARD_DATA_DIR,
    pollIntervalMs: values.JOB_POLL_INTERVAL_MS,
    jobTimeoutMs: values.JOB_TIMEOUT_MS,
    retry: {
      maxRetries: values.JOB_MAX_RETRIES,
      baseDelayMs: values.JOB_RETRY_BASE_DELAY_MS,
      maxDelayMs: values.JOB_RETRY_MAX_DELAY_MS,
      jitterFactor: values.JOB_RETRY_JITTER,
    },
    staleJobTimeoutMs: values.JOB_STALE_TIMEOUT_MS,
    staleJobRecoveryIntervalMs: values.JOB_STALE_RECOVERY_INTERVAL_MS,
    orphanPolicy: values.JOB_ORPHAN_POLICY,
    retentionDays: values.JOB_RETENTION_DAYS,
    shutdownTimeoutMs: values.SHUTDOWN_TIMEOUT_MS,
    logLevel: values.LOG_LEVEL,
  };
}
