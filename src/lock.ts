/**
 * Per-destination run lock
 *
 * Two runs writing the same destination can both create the same missing
 * event. The CLI therefore holds an exclusive lock file named after the
 * destination calendar for the duration of a sync. The holder's PID is
 * written to a private file first and linked into place, so the lock file
 * never exists without a PID in it. A lock whose content names no live
 * process is taken over.
 */

import { createHash } from 'node:crypto';
import { link, readFile, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { LockHeldError } from './errors.js';

export type ReleaseLock = () => Promise<void>;

export function lockPathFor(lockDir: string, calendarName: string): string {
  const digest = createHash('sha1').update(calendarName).digest('hex').slice(0, 16);
  return join(lockDir, `calendar-mirror-${digest}.lock`);
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: exists but owned by someone else
    return (error as NodeJS.ErrnoException).code === 'EPERM';
  }
}

async function removeIfPresent(path: string): Promise<void> {
  await unlink(path).catch((error: NodeJS.ErrnoException) => {
    if (error.code !== 'ENOENT') {
      throw error;
    }
  });
}

/** Lock content, or undefined when the file is gone */
async function readHolder(lockPath: string): Promise<string | undefined> {
  try {
    return await readFile(lockPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

function isStale(content: string): boolean {
  const text = content.trim();
  if (!/^\d+$/.test(text)) {
    return true;
  }
  const pid = Number.parseInt(text, 10);
  return pid <= 0 || !isProcessAlive(pid);
}

async function tryCreate(lockPath: string): Promise<boolean> {
  const pending = `${lockPath}.${process.pid}.tmp`;
  await writeFile(pending, `${process.pid}\n`);
  try {
    await link(pending, lockPath);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'EEXIST') {
      return false;
    }
    throw error;
  } finally {
    await removeIfPresent(pending);
  }
}

/**
 * Take the lock for a destination calendar
 * @throws LockHeldError when a live process holds it
 */
export async function acquireLock(lockDir: string, calendarName: string): Promise<ReleaseLock> {
  const lockPath = lockPathFor(lockDir, calendarName);

  if (!(await tryCreate(lockPath))) {
    const holder = await readHolder(lockPath);
    if (holder !== undefined) {
      if (!isStale(holder)) {
        throw new LockHeldError(lockPath);
      }
      // another run may have replaced the stale lock since it was read
      if ((await readHolder(lockPath)) !== holder) {
        throw new LockHeldError(lockPath);
      }
      console.warn(`[lock] Removing stale lock ${lockPath}`);
      await removeIfPresent(lockPath);
    }
    if (!(await tryCreate(lockPath))) {
      throw new LockHeldError(lockPath);
    }
  }

  return async () => {
    await removeIfPresent(lockPath);
  };
}
