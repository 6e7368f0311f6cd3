/**
 * FsRunLock - lock file linked into place whole
 *
 * The lock content is written to a private temp file and hard-linked to the
 * lock path, so the link either fails with EEXIST or publishes a complete
 * holder record. A lock left behind by a process that no longer exists on
 * this host (or one that cannot be parsed and is older than
 * UNPARSABLE_LOCK_GRACE_MS) is taken over by renaming it aside first: only
 * the run whose rename carries the exact content it judged stale goes on.
 *
 * @module run_lock/fs/fs_run_lock
 */

import { randomUUID } from 'crypto';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { RunLock, RunLockInfo } from '../run_lock';
import { RunLockError } from '../run_lock';
import { createLogger } from '../../logger';

const logger = createLogger('[RunLock] ');

/** An unparsable lock younger than this is assumed to belong to a live run. */
export const UNPARSABLE_LOCK_GRACE_MS = 5_000;

export type FsRunLockOptions = {
  lockPath: string;
  /** Default: signal-0 probe */
  isProcessAlive?: (pid: number) => boolean;
};

type LockFileState = {
  content: string;
  holder: RunLockInfo | null;
  modifiedAt: number;
};

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err: unknown) {
    const error = err as NodeJS.ErrnoException;
    // EPERM: exists, owned by someone else
    return error.code !== 'ESRCH';
  }
}

function parseLockInfo(content: string): RunLockInfo | null {
  try {
    const parsed: unknown = JSON.parse(content);
    if (
      typeof parsed === 'object' && parsed !== null &&
      'pid' in parsed && typeof parsed.pid === 'number' &&
      'hostname' in parsed && typeof parsed.hostname === 'string' &&
      'acquiredAt' in parsed && typeof parsed.acquiredAt === 'string'
    ) {
      return { pid: parsed.pid, hostname: parsed.hostname, acquiredAt: parsed.acquiredAt };
    }
    return null;
  } catch {
    return null;
  }
}

export class FsRunLock implements RunLock {
  readonly lockPath: string;
  private readonly isAlive: (pid: number) => boolean;
  /** Content this instance published, while held */
  private heldContent: string | null = null;

  constructor(options: FsRunLockOptions) {
    this.lockPath = options.lockPath;
    this.isAlive = options.isProcessAlive ?? isProcessAlive;
  }

  /**
   * Lock path for a fingerprint store file: `<store>.lock`.
   */
  static forStore(storePath: string, options: Omit<FsRunLockOptions, 'lockPath'> = {}): FsRunLock {
    return new FsRunLock({ ...options, lockPath: `${storePath}.lock` });
  }

  async acquire(): Promise<void> {
    await fs.mkdir(path.dirname(this.lockPath), { recursive: true });

    if (await this.tryCreate()) return;

    const current = await this.readLockFile();
    if (current === null) {
      // Released between the two steps
      if (await this.tryCreate()) return;
      throw new RunLockError(`Another run acquired ${this.lockPath} first`, this.lockPath);
    }

    const { holder } = current;
    if (holder && !this.isStale(holder)) {
      throw new RunLockError(
        `Another run holds ${this.lockPath} (pid ${holder.pid} on ${holder.hostname} since ${holder.acquiredAt})`,
        this.lockPath,
        holder
      );
    }
    if (!holder && Date.now() - current.modifiedAt < UNPARSABLE_LOCK_GRACE_MS) {
      throw new RunLockError(`Lock ${this.lockPath} is unreadable and recent; another run may be starting`, this.lockPath);
    }

    logger.warn(`Taking over stale lock ${this.lockPath}${holder ? ` left by pid ${holder.pid}` : ''}`);

    if (!(await this.claimStale(current.content)) || !(await this.tryCreate())) {
      throw new RunLockError(`Another run acquired ${this.lockPath} first`, this.lockPath);
    }
  }

  async release(): Promise<void> {
    if (this.heldContent === null) return;
    const current = await this.readLockFile();
    if (current && current.content === this.heldContent) {
      await fs.rm(this.lockPath, { force: true });
    }
    this.heldContent = null;
  }

  private async tryCreate(): Promise<boolean> {
    const info: RunLockInfo = {
      pid: process.pid,
      hostname: os.hostname(),
      acquiredAt: new Date().toISOString(),
    };
    const content = JSON.stringify(info);
    const tmpPath = `${this.lockPath}.${process.pid}.${randomUUID()}.tmp`;

    try {
      await fs.writeFile(tmpPath, content, { flag: 'wx', mode: 0o600 });
      await fs.link(tmpPath, this.lockPath);
      this.heldContent = content;
      return true;
    } catch (err: unknown) {
      const error = err as NodeJS.ErrnoException;
      if (error.code === 'EEXIST') return false;
      throw new RunLockError(`Cannot create lock ${this.lockPath}: ${error.message}`, this.lockPath);
    } finally {
      await fs.rm(tmpPath, { force: true });
    }
  }

  /**
   * Moves the lock aside and keeps it out of the way only when it still
   * carries `expected`. Another run's fresh lock is put back.
   */
  private async claimStale(expected: string): Promise<boolean> {
    const claimedPath = `${this.lockPath}.stale.${process.pid}.${randomUUID()}`;

    try {
      await fs.rename(this.lockPath, claimedPath);
    } catch (err: unknown) {
      const error = err as NodeJS.ErrnoException;
      if (error.code === 'ENOENT') return false;
      throw new RunLockError(`Cannot claim stale lock ${this.lockPath}: ${error.message}`, this.lockPath);
    }

    try {
      const claimed = await fs.readFile(claimedPath, 'utf-8');
      if (claimed === expected) return true;

      try {
        await fs.link(claimedPath, this.lockPath);
      } catch (err: unknown) {
        const error = err as NodeJS.ErrnoException;
        if (error.code !== 'EEXIST') {
          throw new RunLockError(`Cannot restore lock ${this.lockPath}: ${error.message}`, this.lockPath);
        }
        logger.warn(`Lock ${this.lockPath} was recreated while restoring it`);
      }
      return false;
    } finally {
      await fs.rm(claimedPath, { force: true });
    }
  }

  private async readLockFile(): Promise<LockFileState | null> {
    try {
      const stats = await fs.stat(this.lockPath);
      const content = await fs.readFile(this.lockPath, 'utf-8');
      return { content, holder: parseLockInfo(content), modifiedAt: stats.mtimeMs };
    } catch (err: unknown) {
      const error = err as NodeJS.ErrnoException;
      if (error.code === 'ENOENT') return null;
      throw new RunLockError(`Cannot read lock ${this.lockPath}: ${error.message}`, this.lockPath);
    }
  }

  private isStale(holder: RunLockInfo): boolean {
    // Another host's pid cannot be probed from here
    if (holder.hostname !== os.hostname()) return false;
    return !this.isAlive(holder.pid);
  }
}
