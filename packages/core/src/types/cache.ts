/**
 * One cached value for a key.
 *
 * Entries are immutable: a refresh writes a new entry that atomically replaces
 * the previous one.
 */
export interface CacheEntry<T> {
  /** Cache key the entry is stored under. */
  key: string;

  /** The cached value, as returned by the data fetcher. */
  payload: T;

  /** When the payload was fetched, in milliseconds since epoch. */
  fetchedAt: number;
}

/**
 * Marker left behind by a failed refresh.
 *
 * While it is recent, no new refresh is started for the key.
 */
export interface FailureRecord {
  key: string;
  failedAt: number;
  message: string;
}

/**
 * Durable key → entry storage.
 *
 * Implementations:
 * - `FileCacheStore` (one JSON file per key, shared between processes)
 * - `MemoryCacheStore` (tests and single-process embedding)
 */
export interface CacheStore<T> {
  /** Return whatever is stored for `key`, regardless of age. */
  read(key: string): Promise<CacheEntry<T> | null>;

  /** Store `payload` for `key`, replacing any previous entry in one step. */
  write(key: string, payload: T, now: number): Promise<CacheEntry<T>>;

  isFresh(entry: CacheEntry<T>, maxAgeMs: number, now: number): boolean;

  /** Remove the entry for `key`. Missing entries are ignored. */
  invalidate(key: string): Promise<void>;

  recordFailure(key: string, message: string, now: number): Promise<void>;
  lastFailure(key: string): Promise<FailureRecord | null>;
  clearFailure(key: string): Promise<void>;
}
