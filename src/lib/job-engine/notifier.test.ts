import { describe, expect, it, vi } from 'vitest';
import { JobStatusNotifier } from './notifier';
import type { JobProgressEvent } from './notifier';

const progress: JobProgressEvent = { jobId: 'job-1', progress: 50, updatedAt: '2025-01-15T09:30:00.000Z' };

describe('JobStatusNotifier', () => {
  it('delivers events to subscribers of that type only', () => {
    const notifier = new JobStatusNotifier();
    const onProgress = vi.fn();
    const onStatus = vi.fn();
    notifier.subscribe('job-progress', onProgress);
    notifier.subscribe('job-status-changed', onStatus);

    notifier.notify('job-progress', progress);

    expect(onProgress).toHaveBeenCalledWith(progress);
    expect(onStatus).not.toHaveBeenCalled();
  });

  it('stops delivering after unsubscribe', () => {
    const notifier = new JobStatusNotifier();
    const listener = vi.fn();
    const unsubscribe = notifier.subscribe('job-progress', listener);
    expect(notifier.getSubscriberCount('job-progress')).toBe(1);

    unsubscribe();
    notifier.notify('job-progress', progress);

    expect(listener).not.toHaveBeenCalled();
    expect(notifier.getSubscriberCount()).toBe(0);
  });

  it('isolates a throwing subscriber from the rest', () => {
    const notifier = new JobStatusNotifier();
    const after = vi.fn();
    notifier.subscribe('job-progress', () => {
      throw new Error('bad listener');
    });
    notifier.subscribe('job-progress', after);

    expect(() => notifier.notify('job-progress', progress)).not.toThrow();
    expect(after).toHaveBeenCalledTimes(1);
  });

  it('contains a rejected async subscriber', async () => {
    const notifier = new JobStatusNotifier();
    const rejected = vi.fn(async () => {
      throw new Error('async failure');
    });
    notifier.subscribe('job-progress', rejected);

    notifier.notify('job-progress', progress);
    await Promise.resolve();

    expect(rejected).toHaveBeenCalledTimes(1);
  });

  it('never throws out of notify, even for raw emitter listeners', () => {
    const notifier = new JobStatusNotifier();
    notifier.on('report-generated', () => {
      throw new Error('raw listener');
    });

    expect(() =>
      notifier.notify('report-generated', {
        jobId: 'job-1',
        reportId: 'report-1',
        fileName: 'TaskList_20250115093000.txt',
        updatedAt: '2025-01-15T09:30:00.000Z',
      })
    ).not.toThrow();
  });
});
