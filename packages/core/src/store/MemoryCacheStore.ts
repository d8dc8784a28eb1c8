import type { CacheEntry, CacheStore, FailureRecord } from '../types/cache.js';

import { isFresh } from './freshness.js';

/**
 * In-memory cache store.
 *
 * Only useful inside a single process (tests, long-running hosts). Entries are
 * replaced wholesale, so readers see either the old or the new entry.
 */
export class MemoryCacheStore<T> implements CacheStore<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly failures = new Map<string, FailureRecord>();

  async read(key: string): Promise<CacheEntry<T> | null> {
    return this.entries.get(key) ?? null;
  }

  async write(key: string, payload: T, now: number): Promise<CacheEntry<T>> {
    const entry: CacheEntry<T> = Object.freeze({ key, payload, fetchedAt: now });
    this.entries.set(key, entry);
    return entry;
  }

  isFresh(entry: CacheEntry<T>, maxAgeMs: number, now: number): boolean {
    return isFresh(entry, maxAgeMs, now);
  }

  async invalidate(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async recordFailure(key: string, message: string, now: number): Promise<void> {
    this.failures.set(key, { key, failedAt: now, message });
  }

  async lastFailure(key: string): Promise<FailureRecord | null> {
    return this.failures.get(key) ?? null;
  }

  async clearFailure(key: string): Promise<void> {
    this.failures.delete(key);
  }
}
