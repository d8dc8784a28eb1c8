import type { CacheStore } from './types/cache.js';
import type { DataFetcher } from './types/fetch.js';
import type { RefreshLock } from './types/handler.js';

import { FetchFailedError, errorMessage } from './errors.js';
import { createChildLogger } from './logging/logger.js';
import type { Logger } from './logging/logger.js';
import { withTimeout } from './utils/timeout.js';

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

export interface RefreshOptions<T> {
  key: string;
  fetcher: DataFetcher<T>;
  store: CacheStore<T>;

  /** Lock held for `key`; always released before this returns. */
  lock: Pick<RefreshLock, 'release'>;

  timeoutMs?: number;
  now?: () => number;
  logger?: Logger;
}

export type RefreshOutcome =
  | { ok: true; fetchedAt: number }
  | { ok: false; error: FetchFailedError | Error };

/**
 * Fetch fresh data for `key` and store it.
 *
 * On failure the previous entry is left untouched and a failure marker is
 * recorded instead. The lock is released on every path. Errors are logged
 * and returned, never thrown.
 */
export async function runRefresh<T>(options: RefreshOptions<T>): Promise<RefreshOutcome> {
  const { key, fetcher, store, lock } = options;
  const now = options.now ?? Date.now;
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
  const logger = options.logger ?? createChildLogger({ component: 'refresh' });

  const startedAt = now();
  logger.info({ key }, 'refreshing');

  try {
    let payload: T;
    try {
      payload = await withTimeout((signal) => fetcher.fetch({ signal }), timeoutMs);
    } catch (error) {
      throw error instanceof FetchFailedError
        ? error
        : new FetchFailedError(errorMessage(error), { cause: error });
    }

    const entry = await store.write(key, payload, now());
    await store
      .clearFailure(key)
      .catch((clearError: unknown) =>
        logger.warn({ key, err: clearError }, 'could not clear refresh failure marker'),
      );
    logger.info({ key, durationMs: now() - startedAt }, 'refresh complete');
    return { ok: true, fetchedAt: entry.fetchedAt };
  } catch (error) {
    const failure = error instanceof Error ? error : new FetchFailedError(errorMessage(error));
    logger.warn({ key, err: failure }, 'refresh failed');
    await store
      .recordFailure(key, failure.message, now())
      .catch((recordError: unknown) =>
        logger.error({ key, err: recordError }, 'could not record refresh failure'),
      );
    return { ok: false, error: failure };
  } finally {
    await lock
      .release(key)
      .catch((releaseError: unknown) =>
        logger.error({ key, err: releaseError }, 'could not release refresh lock'),
      );
  }
}
