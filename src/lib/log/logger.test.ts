import { afterEach, describe, expect, it, vi } from 'vitest';
import { getLogLevel, getLogger, setLogLevel } from './logger';

describe('logger', () => {
  const initialLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(initialLevel);
    vi.restoreAllMocks();
  });

  it('applies a level change to loggers created before it', () => {
    const log = getLogger({ module: 'Early' }).child({ jobId: 'job-1' });
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    setLogLevel('error');
    log.info({}, 'hidden');
    log.warn({}, 'hidden');
    expect(info).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();

    setLogLevel('info');
    log.info({ tasks: 2 }, 'visible');
    expect(info).toHaveBeenCalledWith('[module=Early jobId=job-1]', 'visible', { tasks: 2 });
  });
});
