import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '@/lib/errors';
import { loadEngineSettings } from './settings';

describe('loadEngineSettings', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadEngineSettings({})).toEqual({
      dataDir: './data',
      pollIntervalMs: 10_000,
      jobTimeoutMs: 300_000,
      retry: { maxRetries: 3, baseDelayMs: 10_000, maxDelayMs: 600_000, jitterFactor: 0.1 },
      staleJobTimeoutMs: 600_000,
      staleJobRecoveryIntervalMs: 60_000,
      orphanPolicy: 'reclaim',
      retentionDays: 30,
      shutdownTimeoutMs: 10_000,
      logLevel: undefined,
    });
  });

  it('reads overrides and treats blank values as unset', () => {
    const settings = loadEngineSettings({
      TASKBOARD_DATA_DIR: '/var/lib/taskboard',
      JOB_POLL_INTERVAL_MS: '2500',
      JOB_MAX_RETRIES: '0',
      JOB_ORPHAN_POLICY: 'manual',
      JOB_RETENTION_DAYS: ' ',
      LOG_LEVEL: 'debug',
    });

    expect(settings.dataDir).toBe('/var/lib/taskboard');
    expect(settings.pollIntervalMs).toBe(2500);
    expect(settings.retry.maxRetries).toBe(0);
    expect(settings.orphanPolicy).toBe('manual');
    expect(settings.retentionDays).toBe(30);
    expect(settings.logLevel).toBe('debug');
  });

  it('rejects malformed numbers', () => {
    expect(() => loadEngineSettings({ JOB_POLL_INTERVAL_MS: 'soon' })).toThrow(ConfigurationError);
  });

  it('caps the retry jitter at one half', () => {
    expect(loadEngineSettings({ JOB_RETRY_JITTER: '0.5' }).retry.jitterFactor).toBe(0.5);
    expect(() => loadEngineSettings({ JOB_RETRY_JITTER: '1' })).toThrow(/JOB_RETRY_JITTER/);
  });

    it('rejects an unknown orphan policy', () => {
    expect(() => loadEngineSettings({ JOB_ORPHAN_POLICY: 'ignore' })).toThrow(/JOB_ORPHAN_POLICY/);
  });

  it('requires the stale timeout to exceed the job timeout', () => {
    expect(() => loadEngineSettings({ JOB_TIMEOUT_MS: '600000', JOB_STALE_TIMEOUT_MS: '600000' })).toThrow(
      'Invalid configuration: JOB_STALE_TIMEOUT_MS: must be greater than JOB_TIMEOUT_MS'
    );
  });
});
