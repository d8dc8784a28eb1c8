import { randomBytes } from 'node:crypto';
import { link, mkdir, readFile, rename, stat, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import type { RefreshLock } from '../types/handler.js';

import { LockUnavailableError, errorCode } from '../errors.js';
import { createChildLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import { writeFileAtomic } from '../utils/atomicWrite.js';
import { keyToFileStem } from '../utils/keys.js';
import { isProcessAlive } from './process.js';

const DEFAULT_LOCK_TTL_MS = 2 * 60_000;

/** A break guard older than this was left behind by a crashed caller. */
const BREAK_GUARD_TTL_MS = 10_000;

type NowFn = () => number;

export interface RefreshCoordinatorOptions {
  /** Directory holding the lock files (usually the cache directory). */
  dir: string;

  /**
   * Age after which a lock is considered abandoned even if its holder still
   * appears to be alive. Should exceed the fetch timeout.
   */
  lockTtlMs?: number;

  /** Pid recorded as the holder. Defaults to `process.pid`. */
  pid?: number;

  /** Time source override used in tests. */
  now?: NowFn;

  /** Liveness check override used in tests. */
  isAlive?: (pid: number) => boolean;

  logger?: Logger;
}

/**
 * Current holder of a refresh lock.
 */
export interface LockHolder {
  key: string;
  pid: number;
  acquiredAt: number;
}

type LockFile = {
  /** `null` when the file exists but is still being written (or is garbage). */
  holder: LockHolder | null;
  raw: string;
  modifiedAt: number;
};

const holderSchema = z.object({
  key: z.string(),
  pid: z.number().int(),
  acquiredAt: z.number(),
});

/**
 * Cross-process "one refresh per key" lock.
 *
 * Each lock is a file created with an exclusive open (`wx`), so exactly one of
 * several racing processes succeeds. The file records the holder's pid; a lock
 * whose holder has exited, or that is older than `lockTtlMs`, is stale and may
 * be broken by the next caller. A crashed refresh therefore never blocks the
 * key for longer than its holder's lifetime (or the TTL).
 */
export class RefreshCoordinator implements RefreshLock {
  private readonly dir: string;
  private readonly lockTtlMs: number;
  private readonly pid: number;
  private readonly now: NowFn;
  private readonly isAlive: (pid: number) => boolean;
  private readonly logger: Logger;

  constructor(options: RefreshCoordinatorOptions) {
    this.dir = options.dir;
    this.lockTtlMs = Math.max(0, options.lockTtlMs ?? DEFAULT_LOCK_TTL_MS);
    this.pid = options.pid ?? process.pid;
    this.now = options.now ?? Date.now;
    this.isAlive = options.isAlive ?? isProcessAlive;
    this.logger = options.logger ?? createChildLogger({ component: 'refresh-lock' });
  }

  /**
   * Atomically test-and-set the lock for `key`.
   *
   * Returns `true` iff the caller now holds it. Throws `LockUnavailableError`
   * when the lock file cannot be created or inspected for any other reason.
   */
  async tryAcquire(key: string): Promise<boolean> {
    const lockPath = this.lockPath(key);
    const holder: LockHolder = { key, pid: this.pid, acquiredAt: this.now() };

    try {
      await mkdir(this.dir, { recursive: true });
    } catch (error) {
      throw new LockUnavailableError(key, { cause: error });
    }

    // Second attempt only happens after breaking a stale lock.
    for (let attempt = 0; attempt < 2; attempt += 1) {
      try {
        await writeFile(lockPath, JSON.stringify(holder), { encoding: 'utf8', flag: 'wx' });
        this.logger.debug({ key, pid: this.pid }, 'refresh lock acquired');
        return true;
      } catch (error) {
        if (errorCode(error) !== 'EEXIST') {
          throw new LockUnavailableError(key, { cause: error });
        }
      }

      const broken = await this.breakIfStale(key);
      if (!broken) return false;
    }

    return false;
  }

  /**
   * Remove the lock for `key`. Calling it when no lock exists is a no-op.
   */
  async release(key: string): Promise<void> {
    try {
      await unlink(this.lockPath(key));
      this.logger.debug({ key }, 'refresh lock released');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return;
      throw new LockUnavailableError(key, { cause: error });
    }
  }

  /**
   * Make `pid` the holder of a lock currently held by `from` (this
   * coordinator's pid unless given).
   *
   * Used when the refresh continues in a detached child process: once the
   * spawning process exits, the lock stays valid for as long as the child runs.
   * Returns `false`, leaving the file alone, when the lock is gone or someone
   * else holds it by now.
   */
  async handOff(key: string, pid: number, options: { from?: number } = {}): Promise<boolean> {
    const from = options.from ?? this.pid;
    const current = await this.readLockFile(key);
    if (current?.holder?.pid !== from) {
      this.logger.debug(
        { key, from, to: pid, holder: current?.holder?.pid ?? null },
        'refresh lock not handed off: holder changed',
      );
      return false;
    }

    const holder: LockHolder = { key, pid, acquiredAt: this.now() };
    try {
      await writeFileAtomic(this.lockPath(key), JSON.stringify(holder));
    } catch (error) {
      throw new LockUnavailableError(key, { cause: error });
    }
    return true;
  }

  /**
   * Current holder, or `null` when the key is unlocked (or only stale-locked).
   */
  async holder(key: string): Promise<LockHolder | null> {
    const file = await this.readLockFile(key);
    if (!file || this.isStale(file)) return null;
    return file.holder;
  }

  async isLocked(key: string): Promise<boolean> {
    const file = await this.readLockFile(key);
    return file !== null && !this.isStale(file);
  }

  /**
   * Run `fn` while holding the lock for `key`, releasing it on every exit path.
   */
  async withLock<T>(
    key: string,
    fn: () => Promise<T>,
  ): Promise<{ acquired: true; value: T } | { acquired: false }> {
    if (!(await this.tryAcquire(key))) return { acquired: false };
    try {
      return { acquired: true, value: await fn() };
    } finally {
      await this.release(key);
    }
  }

  lockPath(key: string): string {
    return path.join(this.dir, `${keyToFileStem(key)}.lock`);
  }

  private isStale(file: LockFile): boolean {
    const age = this.now() - (file.holder?.acquiredAt ?? file.modifiedAt);
    if (age >= this.lockTtlMs) return true;
    if (file.holder === null) return false;
    return !this.isAlive(file.holder.pid);
  }

  private guardPath(key: string): string {
    return `${this.lockPath(key)}.break`;
  }

  /**
   * Remove the lock for `key` if it is stale.
   *
   * Only the caller that wins the break guard (another `wx` file) may touch a
   * stale lock; everyone else treats the key as held. The guard is released
   * before the caller retries the lock itself.
   */
  private async breakIfStale(key: string): Promise<boolean> {
    const file = await this.readLockFile(key);
    if (file === null) return true;
    if (!this.isStale(file)) return false;

    if (!(await this.acquireBreakGuard(key))) return false;
    try {
      return await this.removeStaleLock(key);
    } finally {
      await unlink(this.guardPath(key)).catch((error: unknown) => {
        if (errorCode(error) !== 'ENOENT') {
          this.logger.error({ key, err: error }, 'could not remove lock-break guard');
        }
      });
    }
  }

  private async acquireBreakGuard(key: string): Promise<boolean> {
    for (let attempt = 0; attempt < 2; attempt += 1) {
      try {
        await writeFile(this.guardPath(key), String(this.pid), { encoding: 'utf8', flag: 'wx' });
        return true;
      } catch (error) {
        if (errorCode(error) !== 'EEXIST') {
          throw new LockUnavailableError(key, { cause: error });
        }
      }
      if (attempt > 0 || !(await this.clearAbandonedGuard(key))) return false;
    }
    return false;
  }

  /**
   * Delete a break guard whose owner crashed mid-break. Returns `true` when
   * the guard is gone.
   */
  private async clearAbandonedGuard(key: string): Promise<boolean> {
    const guardPath = this.guardPath(key);
    try {
      const info = await stat(guardPath);
      if (Date.now() - info.mtimeMs < BREAK_GUARD_TTL_MS) return false;
      await unlink(guardPath);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') throw new LockUnavailableError(key, { cause: error });
      return true;
    }
    this.logger.warn({ key }, 'removed abandoned lock-break guard');
    return true;
  }

  /**
   * Called with the break guard held. The lock is renamed aside, and deleted
   * only if it is still the stale file; a lock that changed in between is
   * linked back, which never replaces a newer lock file.
   */
  private async removeStaleLock(key: string): Promise<boolean> {
    const file = await this.readLockFile(key);
    if (file === null) return true;
    if (!this.isStale(file)) return false;

    const lockPath = this.lockPath(key);
    const asidePath = `${lockPath}.${this.pid}.${randomBytes(4).toString('hex')}.stale`;

    try {
      await rename(lockPath, asidePath);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return true;
      throw new LockUnavailableError(key, { cause: error });
    }

    try {
      const moved = await readFile(asidePath, 'utf8');
      if (moved !== file.raw) {
        await link(asidePath, lockPath).catch((error: unknown) => {
          if (errorCode(error) !== 'EEXIST') throw error;
        });
        await unlink(asidePath);
        return false;
      }
      await unlink(asidePath);
    } catch (error) {
      throw new LockUnavailableError(key, { cause: error });
    }

    this.logger.warn(
      { key, pid: file.holder?.pid, acquiredAt: file.holder?.acquiredAt },
      'broke stale refresh lock',
    );
    return true;
  }

  private async readLockFile(key: string): Promise<LockFile | null> {
    const lockPath = this.lockPath(key);
    try {
      const [raw, info] = await Promise.all([readFile(lockPath, 'utf8'), stat(lockPath)]);
      return { raw, holder: parseHolder(raw), modifiedAt: info.mtimeMs };
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return null;
      throw new LockUnavailableError(key, { cause: error });
    }
  }
}

function parseHolder(raw: string): LockHolder | null {
  try {
    const parsed = holderSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}
