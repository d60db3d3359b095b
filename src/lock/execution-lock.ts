/**
 * ExecutionLock
 *
 * Single-instance guard for the cleanup run: an exclusively created PID file.
 * acquire() never waits. If the file exists and names a live process the run is
 * refused with LockContentionError; a file left by a dead process is removed
 * and the lock taken over, so a crash never blocks later runs.
 *
 * Liveness is judged by PID only. If the recorded PID has since been reused by an
 * unrelated live process, runs are refused until that process exits or the
 * lock file is removed by hand.
 */

import fs from 'fs';
import { LockContentionError } from '../utils/errors';
import { logger } from '../config/logger';

const MAX_ACQUIRE_ATTEMPTS = 3;
const DEFAULT_STALE_AFTER_MS = 60_000;

const RELEASE_SIGNALS = ['SIGINT', 'SIGTERM', 'SIGHUP'] as const;
const SIGNAL_EXIT_CODES: Partial<Record<NodeJS.Signals, number>> = {
  SIGHUP: 129,
  SIGINT: 130,
  SIGTERM: 143,
};

export interface ExecutionLockOptions {
  pid?: number;
  isProcessAlive?: (pid: number) => boolean;
  /** Age after which an unreadable lock file is considered abandoned. */
  staleAfterMs?: number;
}

function errorCode(error: unknown): unknown {
  return error instanceof Error && 'code' in error ? error.code : undefined;
}

/**
 * EPERM means the process exists but belongs to someone else.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errorCode(error) === 'EPERM';
  }
}

export function parseLockPid(contents: string): number | undefined {
  const trimmed = contents.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  const pid = Number(trimmed);
  return pid > 0 ? pid : undefined;
}

export class ExecutionLock {
  private readonly pid: number;
  private readonly isAlive: (pid: number) => boolean;
  private readonly staleAfterMs: number;
  private held = false;

  constructor(
    readonly lockPath: string,
    options: ExecutionLockOptions = {}
  ) {
    this.pid = options.pid ?? process.pid;
    this.isAlive = options.isProcessAlive ?? isProcessAlive;
    this.staleAfterMs = options.staleAfterMs ?? DEFAULT_STALE_AFTER_MS;
  }

  get isHeld(): boolean {
    return this.held;
  }

  /**
   * @throws LockContentionError when another live process holds the lock
   */
  acquire(): void {
    if (this.held) {
      return;
    }

    for (let attempt = 0; attempt < MAX_ACQUIRE_ATTEMPTS; attempt++) {
      if (this.tryCreate()) {
        this.held = true;
        logger.debug('ExecutionLock: Lock acquired', { lockPath: this.lockPath, pid: this.pid });
        return;
      }

      const holderPid = this.readHolder();
      if (holderPid === null) {
        // Removed between our create and read; try again.
        continue;
      }

      if (!this.isStale(holderPid)) {
        throw new LockContentionError(this.lockPath, holderPid);
      }

      logger.warn('ExecutionLock: Removing stale lock file', { lockPath: this.lockPath, holderPid });
      this.takeOver(holderPid);
    }

    throw new LockContentionError(this.lockPath);
  }

  /**
   * Safe to call when not held. Only removes the file if it still carries our PID.
   */
  release(): void {
    if (!this.held) {
      return;
    }
    this.held = false;

    const holderPid = this.readHolder();
    if (holderPid === null) {
      return;
    }
    if (holderPid !== this.pid) {
      logger.warn('ExecutionLock: Lock file no longer ours, leaving it in place', {
        lockPath: this.lockPath,
        holderPid,
      });
      return;
    }
    this.removeFile();
    logger.debug('ExecutionLock: Lock released', { lockPath: this.lockPath });
  }

  private tryCreate(): boolean {
    let fd: number;
    try {
      fd = fs.openSync(this.lockPath, 'wx');
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        return false;
      }
      throw error;
    }

    try {
      fs.writeSync(fd, `${this.pid}\n`);
    } finally {
      fs.closeSync(fd);
    }
    return true;
  }

  /**
   * Moves the stale file aside under a name only we use, then checks that what we
   * moved is still the file judged stale. If another contender replaced it in the
   * meantime, their file is put back and we back off.
   *
   * @throws LockContentionError when the lock changed hands during the takeover
   */
  private takeOver(stalePid: number | undefined): void {
    const claimPath = `${this.lockPath}.${this.pid}.stale`;
    try {
      fs.renameSync(this.lockPath, claimPath);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return;
      }
      throw error;
    }

    const claimedPid = this.readHolder(claimPath);
    const unchanged =
      claimedPid === stalePid && (claimedPid !== undefined || this.isOld(claimPath));

    if (unchanged) {
      this.removeFile(claimPath);
      return;
    }

    try {
      fs.linkSync(claimPath, this.lockPath);
    } catch (error) {
      if (errorCode(error) !== 'EEXIST') {
        throw error;
      }
    } finally {
      this.removeFile(claimPath);
    }
    throw new LockContentionError(this.lockPath, claimedPid ?? undefined);
  }

  /**
   * @returns the holder's PID, undefined when the file is unreadable as a PID, null when it is gone
   */
  private readHolder(filePath: string = this.lockPath): number | undefined | null {
    try {
      return parseLockPid(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  private isStale(holderPid: number | undefined): boolean {
    if (holderPid === undefined) {
      // Possibly still being written by its creator; give it a grace period.
      return this.isOld(this.lockPath);
    }
    // A recycled PID equal to ours cannot be another live instance.
    return holderPid === this.pid || !this.isAlive(holderPid);
  }

  private isOld(filePath: string): boolean {
    try {
      return Date.now() - fs.statSync(filePath).mtimeMs > this.staleAfterMs;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return true;
      }
      throw error;
    }
  }

  private removeFile(filePath: string = this.lockPath): void {
    try {
      fs.unlinkSync(filePath);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        throw error;
      }
    }
  }
}

/**
 * Holds the lock for the duration of fn. The lock is also released when the
 * process exits early or is stopped by SIGINT, SIGTERM or SIGHUP.
 */
export async function withExecutionLock<T>(lock: ExecutionLock, fn: () => Promise<T>): Promise<T> {
  lock.acquire();

  const onExit = (): void => lock.release();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn('ExecutionLock: Received signal, releasing lock', { signal, lockPath: lock.lockPath });
    lock.release();
    process.exit(SIGNAL_EXIT_CODES[signal] ?? 1);
  };

  process.once('exit', onExit);
  for (const signal of RELEASE_SIGNALS) {
    process.once(signal, onSignal);
  }

  try {
    return await fn();
  } finally {
    lock.release();
    process.removeListener('exit', onExit);
    for (const signal of RELEASE_SIGNALS) {
      process.removeListener(signal, onSignal);
    }
  }
}
