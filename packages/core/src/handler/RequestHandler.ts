import { EventEmitter } from 'node:events';

import type { CacheEntry, CacheStore } from '../types/cache.js';
import type { HandlerResponse, RefreshLock } from '../types/handler.js';
import type { BackgroundJob, BackgroundRunner } from '../types/runner.js';

import { LockUnavailableError, StorageUnavailableError } from '../errors.js';
import { createChildLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';

export const DEFAULT_RETRY_BACKOFF_MS = 30_000;

export type ItemFilter<TItem> = (items: TItem[], query: string) => TItem[];

export interface RequestHandlerOptions<TItem> {
  /** Cache key the handler serves. */
  key: string;

  store: CacheStore<TItem[]>;
  lock: RefreshLock;
  runner: BackgroundRunner;

  /**
   * Build the refresh job for `key`. Only called once the lock is held; the
   * job must release it.
   */
  createJob: (key: string) => BackgroundJob;

  /** Entries older than this are stale. `0` means always stale. */
  maxAgeMs: number;

  /**
   * After a failed refresh, wait this long before starting another one.
   * `0` retries on every stale request.
   */
  retryBackoffMs?: number;

  /** Narrow the cached items for a query. Defaults to returning all items. */
  filter?: ItemFilter<TItem>;

  logger?: Logger;
}

/**
 * Why a stale request did not start a refresh.
 */
export type RefreshSkipReason = 'locked' | 'lock-error' | 'backoff' | 'spawn-error';

/**
 * Per-query entry point of the stale-while-revalidate cache.
 *
 * Each call reads the cache, starts at most one background refresh when the
 * data is stale or missing, and answers immediately with whatever is cached.
 * `rerun` tells the host to ask again shortly, while the data is not fresh.
 *
 * Events:
 * - `refresh:spawned` `(key)`
 * - `refresh:skipped` `(key, reason: RefreshSkipReason)`
 */
export class RequestHandler<TItem> extends EventEmitter {
  private readonly options: RequestHandlerOptions<TItem>;
  private readonly logger: Logger;

  constructor(options: RequestHandlerOptions<TItem>) {
    super();
    if (!(options.maxAgeMs >= 0)) {
      throw new RangeError(`maxAgeMs must be >= 0 (got ${options.maxAgeMs})`);
    }
    this.options = options;
    this.logger = options.logger ?? createChildLogger({ component: 'request-handler' });
  }

  async handle(query: string, now: number = Date.now()): Promise<HandlerResponse<TItem>> {
    const { key, store, maxAgeMs } = this.options;

    const entry = await this.readEntry();
    const stale = entry === null || !store.isFresh(entry, maxAgeMs, now);

    if (stale) {
      await this.maybeRefresh(now);
    }

    if (entry === null) {
      return { items: [], rerun: true, status: 'empty' };
    }

    const filter = this.options.filter ?? ((items: TItem[]) => items);
    this.logger.debug({ key, stale, fetchedAt: entry.fetchedAt }, 'serving cached entry');

    return {
      items: filter(entry.payload, query),
      rerun: stale,
      status: stale ? 'stale' : 'fresh',
      fetchedAt: entry.fetchedAt,
    };
  }

  private async readEntry(): Promise<CacheEntry<TItem[]> | null> {
    const { key, store } = this.options;
    try {
      return await store.read(key);
    } catch (error) {
      if (!(error instanceof StorageUnavailableError)) throw error;
      this.logger.warn({ key, err: error }, 'cache unreadable, serving no data');
      return null;
    }
  }

  private async maybeRefresh(now: number): Promise<void> {
    const { key, store, lock, runner } = this.options;
    const retryBackoffMs = this.options.retryBackoffMs ?? DEFAULT_RETRY_BACKOFF_MS;

    const failure = await store.lastFailure(key).catch((error: unknown) => {
      this.logger.warn({ key, err: error }, 'cannot read failure marker');
      return null;
    });
    if (failure && now - failure.failedAt < retryBackoffMs) {
      this.skip('backoff', { failedAt: failure.failedAt });
      return;
    }

    let acquired: boolean;
    try {
      acquired = await lock.tryAcquire(key);
    } catch (error) {
      if (!(error instanceof LockUnavailableError)) throw error;
      this.skip('lock-error', { err: error });
      return;
    }

    if (!acquired) {
      this.skip('locked');
      return;
    }

    try {
      await runner.spawnDetached(this.options.createJob(key));
    } catch (error) {
      this.skip('spawn-error', { err: error });
      await lock.release(key).catch((releaseError: unknown) => {
        this.logger.error({ key, err: releaseError }, 'could not release refresh lock');
      });
      return;
    }

    this.logger.debug({ key }, 'refresh spawned');
    this.emit('refresh:spawned', key);
  }

  private skip(reason: RefreshSkipReason, details: Record<string, unknown> = {}): void {
    const { key } = this.options;
    const level = reason === 'spawn-error' || reason === 'lock-error' ? 'warn' : 'debug';
    this.logger[level]({ key, reason, ...details }, 'refresh not started');
    this.emit('refresh:skipped', key, reason);
  }
}
