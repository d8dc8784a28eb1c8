/**
 * Options passed to a single fetch.
 */
export type FetchOptions = {
  /** Aborted when the refresh times out. */
  signal?: AbortSignal;
};

/**
 * The slow external source.
 *
 * One call is one round-trip. Failures should be reported by throwing
 * (ideally a `FetchFailedError`).
 */
export interface DataFetcher<T> {
  fetch(options?: FetchOptions): Promise<T>;
}
