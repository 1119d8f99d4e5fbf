/**
 * ProvisioningLock
 *
 * Exclusive lock file guarding environment creation across concurrent
 * launches. The file is created with O_EXCL and records the owner pid;
 * a lock whose owner is gone, or that outlived the stale threshold, is
 * broken.
 *
 * Breaking renames the lock aside first and compares it with the stale
 * record that was read. Another waiter may have broken it and taken a
 * fresh lock in between; that lock is linked back instead of deleted.
 */

import { randomBytes } from 'crypto';
import { link, open, readFile, rename, stat, unlink } from 'fs/promises';
import { setTimeout as sleep } from 'timers/promises';

export interface LockOptions {
  /** Give up waiting for another holder after this long */
  waitMs: number;
  /** A lock older than this is considered abandoned */
  staleMs: number;
  pollMs?: number;
}

interface LockRecord {
  pid: number;
  createdAt: string;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function parseRecord(content: string): LockRecord | null {
  try {
    const parsed: unknown = JSON.parse(content);
    if (
      parsed !== null &&
      typeof parsed === 'object' &&
      'pid' in parsed &&
      typeof parsed.pid === 'number' &&
      'createdAt' in parsed &&
      typeof parsed.createdAt === 'string'
    ) {
      return { pid: parsed.pid, createdAt: parsed.createdAt };
    }
  } catch {
    return null;
  }
  return null;
}

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return null;
    throw error;
  }
}

async function unlinkIfExists(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (error) {
    if (!(isErrnoException(error) && error.code === 'ENOENT')) throw error;
  }
}

function processAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return isErrnoException(error) && error.code === 'EPERM';
  }
}

export class ProvisioningLock {
  private readonly lockPath: string;
  /** Exact content we wrote, while held */
  private record: string | null = null;

  constructor(lockPath: string) {
    this.lockPath = lockPath;
  }

  get isHeld(): boolean {
    return this.record !== null;
  }

  /**
   * @returns true once the lock is held, false if waiting timed out
   */
  async acquire(options: LockOptions): Promise<boolean> {
    const pollMs = options.pollMs ?? 250;
    const deadline = Date.now() + options.waitMs;

    for (;;) {
      if (await this.tryCreate()) {
        return true;
      }

      const stale = await this.readStale(options.staleMs);
      if (stale !== null) {
        await this.breakLock(stale);
        continue;
      }

      if (Date.now() >= deadline) {
        return false;
      }
      await sleep(pollMs);
    }
  }

  /**
   * Remove the lock file if it is still the one we created
   */
  async release(): Promise<void> {
    const record = this.record;
    if (record === null) return;
    this.record = null;

    const current = await readIfExists(this.lockPath);
    if (current !== record) {
      console.warn(`[Lock] ${this.lockPath} was taken over, leaving it in place`);
      return;
    }
    await unlinkIfExists(this.lockPath);
  }

  private async tryCreate(): Promise<boolean> {
    try {
      const handle = await open(this.lockPath, 'wx');
      const record: LockRecord = { pid: process.pid, createdAt: new Date().toISOString() };
      const content = JSON.stringify(record);
      try {
        await handle.writeFile(content);
      } finally {
        await handle.close();
      }
      this.record = content;
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') return false;
      throw error;
    }
  }

  /**
   * @returns The lock's content when it is abandoned, otherwise null
   */
  private async readStale(staleMs: number): Promise<string | null> {
    let content: string;
    let modifiedAt: number;
    try {
      content = await readFile(this.lockPath, 'utf-8');
      modifiedAt = (await stat(this.lockPath)).mtimeMs;
    } catch (error) {
      // Released between our attempt and this check
      if (isErrnoException(error) && error.code === 'ENOENT') return null;
      throw error;
    }

    const record = parseRecord(content);
    if (record && record.pid !== process.pid && !processAlive(record.pid)) {
      return content;
    }
    return Date.now() - modifiedAt > staleMs ? content : null;
  }

  private async breakLock(staleContent: string): Promise<void> {
    const aside = `${this.lockPath}.${process.pid}-${randomBytes(4).toString('hex')}.stale`;
    try {
      await rename(this.lockPath, aside);
    } catch (error) {
      // Another waiter broke it first
      if (isErrnoException(error) && error.code === 'ENOENT') return;
      throw error;
    }

    const taken = await readIfExists(aside);
    if (taken === staleContent) {
      console.warn(`[Lock] Breaking abandoned lock ${this.lockPath}`);
    } else {
      try {
        await link(aside, this.lockPath);
      } catch (error) {
        if (!(isErrnoException(error) && error.code === 'EEXIST')) throw error;
        console.warn(`[Lock] Lost a live lock while breaking ${this.lockPath}`);
      }
    }
    await unlinkIfExists(aside);
  }
}
