/**
 * How the served data relates to the cache.
 *
 * - `fresh`: entry exists and is younger than the max age
 * - `stale`: entry exists but is too old; a refresh is (or was) requested
 * - `empty`: nothing has been cached yet
 */
export type ResponseStatus = 'fresh' | 'stale' | 'empty';

/**
 * Answer to one incoming query.
 */
export type HandlerResponse<TItem> = {
  /** Items to show, already filtered for the query. */
  items: TItem[];

  /** Ask the caller's polling loop to invoke the handler again shortly. */
  rerun: boolean;

  status: ResponseStatus;

  /** `fetchedAt` of the served entry, when there is one. */
  fetchedAt?: number;
};

/**
 * Lock operations the request handler needs.
 */
export interface RefreshLock {
  tryAcquire(key: string): Promise<boolean>;
  release(key: string): Promise<void>;
}
