/**
 * Run-level lock.
 *
 * One provisioning run at a time per host. The lock file holds the owner
 * PID; a lock whose owner is no longer alive is stale and is replaced.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { EngineError, describeThrown, lockHeldError, storageError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { errnoCode, isAlreadyExists, isNotFound } from './fs-errors';

export type LivenessCheck = (pid: number) => boolean;

/** Signal 0 tests for existence; EPERM means the process exists under another user. */
export const isProcessAlive: LivenessCheck = (pid) => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return errnoCode(err) === 'EPERM';
  }
};

export interface RunLockOptions {
  file: string;
  pid?: number;
  isAlive?: LivenessCheck;
  logger?: Logger;
}

export class RunLock {
  private readonly file: string;
  private readonly pid: number;
  private readonly isAlive: LivenessCheck;
  private readonly log: Logger;
  private held = false;

  constructor(options: RunLockOptions) {
    this.file = options.file;
    this.pid = options.pid ?? process.pid;
    this.isAlive = options.isAlive ?? isProcessAlive;
    this.log = (options.logger ?? rootLogger).child({ component: 'run-lock' });
  }

  get isHeld(): boolean {
    return this.held;
  }

  /** PID recorded in the lock file, or null when absent or unparsable. */
  async owner(): Promise<number | null> {
    try {
      const text = (await fs.readFile(this.file, 'utf8')).trim();
      return /^\d+$/.test(text) ? Number(text) : null;
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new EngineError(storageError('LOCK_READ', `Cannot read lock file: ${describeThrown(err)}`, { file: this.file }));
    }
  }

  async acquire(): Promise<void> {
    if (this.held) return;
    try {
      await fs.mkdir(path.dirname(this.file), { recursive: true });
    } catch (err) {
      throw new EngineError(storageError('LOCK_WRITE', `Cannot create lock directory: ${describeThrown(err)}`, { file: this.file }));
    }

    // Two attempts: the second follows removal of a stale lock.
    for (let attempt = 1; attempt <= 2; attempt++) {
      try {
        await fs.writeFile(this.file, `${this.pid}\n`, { flag: 'wx', mode: 0o644 });
        this.held = true;
        this.log.info('Lock acquired', { pid: this.pid });
        return;
      } catch (err) {
        if (!isAlreadyExists(err)) {
          throw new EngineError(storageError('LOCK_WRITE', `Cannot create lock file: ${describeThrown(err)}`, { file: this.file }));
        }
      }

      const ownerPid = await this.owner();
      if (ownerPid !== null && this.isAlive(ownerPid)) {
        throw new EngineError(lockHeldError(this.file, ownerPid));
      }
      this.log.warn('Removing stale lock', { ownerPid });
      await this.remove();
    }
    throw new EngineError(storageError('LOCK_WRITE', 'Lock file reappeared while replacing a stale lock', { file: this.file }));
  }

  /** Release only a lock owned by this process. */
  async release(): Promise<void> {
    if (!this.held) return;
    this.held = false;
    const ownerPid = await this.owner();
    if (ownerPid !== this.pid) {
      this.log.warn('Lock owned by another process; not releasing', { ownerPid, pid: this.pid });
      return;
    }
    await this.remove();
    this.log.info('Lock released', { pid: this.pid });
  }

  private async remove(): Promise<void> {
    try {
      await fs.rm(this.file, { force: true });
    } catch (err) {
      throw new EngineError(storageError('LOCK_WRITE', `Cannot remove lock file: ${describeThrown(err)}`, { file: this.file }));
    }
  }
}

/**
 * Run `task` while holding the lock; the lock is released on every exit
 * path. A failed release is logged and never replaces the task's outcome.
 */
export async function withRunLock<T>(lock: RunLock, task: () => Promise<T>, logger: Logger = rootLogger): Promise<T> {
  await lock.acquire();
  try {
    return await task();
  } finally {
    try {
      await lock.release();
    } catch (err) {
      logger.error('Lock could not be released', { error: describeThrown(err) });
    }
  }
}
