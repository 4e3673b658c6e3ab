import {
  existsSync,
  linkSync,
  mkdirSync,
  readFileSync,
  rmSync,
  statSync,
  writeFileSync,
} from 'node:fs';
import { hostname } from 'node:os';
import { dirname } from 'node:path';
import { createLogger } from '@workspace/logger';
import { RunLockError, errorMessage } from '../errors.js';

const log = createLogger('run-lock');

/** An unreadable lock younger than this still counts as held. */
const UNREADABLE_LOCK_GRACE_MS = 60_000;

type LockOwner = {
  pid: number;
  runId: string;
  host: string;
  acquiredAt: number;
};

function isLockOwner(value: unknown): value is LockOwner {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  return (
    'pid' in value &&
    typeof value.pid === 'number' &&
    'runId' in value &&
    typeof value.runId === 'string' &&
    'host' in value &&
    typeof value.host === 'string' &&
    'acquiredAt' in value &&
    typeof value.acquiredAt === 'number'
  );
}

/**
 * Signal 0 probes for existence without touching the process. EPERM means
 * the process exists under another user.
 */
function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return (
      error instanceof Error &&
      'code' in error &&
      error.code === 'EPERM'
    );
  }
}

/**
 * Single-writer lock for a collection run. Guards the crawler configuration
 * and the progress store from being driven by two runs at once.
 */
export class RunLock {
  private readonly lockPath: string;
  private held: LockOwner | undefined;

  constructor(lockPath: string) {
    this.lockPath = lockPath;
    this.held = undefined;
  }

  acquire(runId: string): LockOwner {
    if (this.held) {
      throw new RunLockError(
        `Run ${this.held.runId} already holds the collection lock in this process`,
        { ...this.held },
      );
    }

    const dir = dirname(this.lockPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    const owner: LockOwner = {
      pid: process.pid,
      runId,
      host: hostname(),
      acquiredAt: Date.now(),
    };

    if (!this.tryCreate(owner)) {
      const current = this.readOwner();

      // Owners on another host cannot be probed, so they are never stale
      if (current && (current.host !== owner.host || isProcessAlive(current.pid))) {
        throw new RunLockError(
          `Another collection run (${current.runId}, pid ${current.pid}) is in progress`,
          { ...current, lockPath: this.lockPath },
        );
      }

      if (!current && this.lockAgeMs() < UNREADABLE_LOCK_GRACE_MS) {
        throw new RunLockError(
          `Collection lock ${this.lockPath} is unreadable and was written recently; another run may hold it`,
          { lockPath: this.lockPath },
        );
      }

      log.warn('Taking over stale collection lock', {
        lockPath: this.lockPath,
        previousOwner: current,
      });
      rmSync(this.lockPath, { force: true });

      if (!this.tryCreate(owner)) {
        throw new RunLockError('Collection lock was taken by another run', {
          lockPath: this.lockPath,
        });
      }
    }

    this.held = owner;
    return owner;
  }

  release(): void {
    if (!this.held) {
      return;
    }

    const current = this.readOwner();
    if (current && current.runId === this.held.runId && current.pid === this.held.pid) {
      rmSync(this.lockPath, { force: true });
    } else {
      log.warn('Collection lock changed owner before release', {
        lockPath: this.lockPath,
        expected: this.held.runId,
        found: current?.runId,
      });
    }

    this.held = undefined;
  }

  isHeld(): boolean {
    return this.held !== undefined;
  }

  readOwner(): LockOwner | undefined {
    if (!existsSync(this.lockPath)) {
      return undefined;
    }

    try {
      const parsed: unknown = JSON.parse(readFileSync(this.lockPath, 'utf-8'));
      return isLockOwner(parsed) ? parsed : undefined;
    } catch (error) {
      log.warn('Unreadable collection lock file', {
        lockPath: this.lockPath,
        error: errorMessage(error),
      });
      return undefined;
    }
  }

  private lockAgeMs(): number {
    try {
      return Date.now() - statSync(this.lockPath).mtimeMs;
    } catch {
      // Removed since the failed create, so nothing holds it
      return Number.POSITIVE_INFINITY;
    }
  }

  /**
   * The owner is written to a private file first and hard-linked into place,
   * so the lock path never exists without its contents.
   */
  private tryCreate(owner: LockOwner): boolean {
    const pendingPath = `${this.lockPath}.${owner.pid}.pending`;

    try {
      writeFileSync(pendingPath, JSON.stringify(owner), 'utf-8');
      linkSync(pendingPath, this.lockPath);
      return true;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
        return false;
      }
      throw new RunLockError(
        `Cannot create collection lock ${this.lockPath}: ${errorMessage(error)}`,
        { lockPath: this.lockPath },
      );
    } finally {
      rmSync(pendingPath, { force: true });
    }
  }
}

export type { LockOwner };
