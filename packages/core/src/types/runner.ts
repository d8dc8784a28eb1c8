/**
 * A unit of background work for one cache key.
 *
 * `run` performs the refresh in-process. Runners that start a separate process
 * use `key` to tell that process what to refresh and never call `run`.
 */
export interface BackgroundJob {
  key: string;
  run(): Promise<unknown>;
}

/**
 * Starts background jobs whose lifetime is independent of the caller.
 *
 * The returned promise settles once the job has been launched, not when it
 * finishes. Outcomes are only visible through later cache reads.
 */
export interface BackgroundRunner {
  spawnDetached(job: BackgroundJob): Promise<void>;
}
