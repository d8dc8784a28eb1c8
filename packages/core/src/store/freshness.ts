import type { CacheEntry } from '../types/cache.js';

/**
 * An entry is fresh while it is strictly younger than `maxAgeMs`.
 *
 * `maxAgeMs = 0` therefore means "always stale".
 */
export function isFresh(entry: Pick<CacheEntry<unknown>, 'fetchedAt'>, maxAgeMs: number, now: number): boolean {
  return now - entry.fetchedAt < maxAgeMs;
}
