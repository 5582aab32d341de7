/**
 * Simple cross-process lock via lock file
 * Ensures only one process runs the job worker against a data directory
 */

import fs from 'fs/promises';
import fsSync from 'fs';
import path from 'path';
import { z } from 'zod';
import { getLogger } from '@/lib/log/logger';

const log = getLogger({ module: 'ProcessLock' });

const lockInfoSchema = z.object({
  pid: z.number().int(),
  createdAt: z.string(),
});

type LockInfo = z.infer<typeof lockInfoSchema>;

export interface ProcessLockResult {
  acquired: boolean;
  lockPath: string;
  ownerPid?: number;
}

export function getLocksDir(dataDir: string): string {
  return path.join(dataDir, 'locks');
}

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function isPidAlive(pid: number): boolean {
  try {
    // Signal 0 checks for existence without killing
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: exists but owned by someone else
    return errorCode(error) !== 'ESRCH';
  }
}

async function readLockInfo(lockPath: string): Promise<LockInfo | null> {
  const raw = await fs.readFile(lockPath, 'utf-8');
  try {
    const parsed = lockInfoSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch (error) {
    log.warn({ err: error, lockPath }, 'unreadable lock file');
    return null;
  }
}

export async function acquireProcessLock(
  locksDir: string,
  lockName: string,
  retried = false
): Promise<ProcessLockResult> {
  await fs.mkdir(locksDir, { recursive: true });
  const lockPath = path.join(locksDir, `${lockName}.lock`);

  try {
    // Attempt exclusive create
    const fd = fsSync.openSync(lockPath, 'wx');
    const info: LockInfo = { pid: process.pid, createdAt: new Date().toISOString() };
    fsSync.writeFileSync(fd, JSON.stringify(info, null, 2));
    fsSync.closeSync(fd);
    return { acquired: true, lockPath };
  } catch (error) {
    if (errorCode(error) !== 'EEXIST') {
      throw error;
    }
  }

  const info = await readLockInfo(lockPath);
  if (!info) {
    // Unparseable lock: assume held
    return { acquired: false, lockPath };
  }

  if (!isPidAlive(info.pid) && !retried) {
    log.warn({ lockPath, stalePid: info.pid }, 'removing stale lock');
    await fs.rm(lockPath, { force: true });
    return acquireProcessLock(locksDir, lockName, true);
  }

  return { acquired: false, lockPath, ownerPid: info.pid };
}

/**
 * Remove the lock if this process owns it
 * @returns true if a lock was removed
 */
export async function releaseProcessLock(lockPath: string): Promise<boolean> {
  let info: LockInfo | null;
  try {
    info = await readLockInfo(lockPath);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return false;
    throw error;
  }

  if (info?.pid !== process.pid) {
    return false;
  }

  await fs.rm(lockPath, { force: true });
  return true;
}
