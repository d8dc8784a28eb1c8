export * from './types/index.js';
export * from './errors.js';

export { isFresh } from './store/freshness.js';
export { FileCacheStore } from './store/FileCacheStore.js';
export type { FileCacheStoreOptions } from './store/FileCacheStore.js';
export { MemoryCacheStore } from './store/MemoryCacheStore.js';

export { RefreshCoordinator } from './lock/RefreshCoordinator.js';
export type { LockHolder, RefreshCoordinatorOptions } from './lock/RefreshCoordinator.js';
export { isProcessAlive } from './lock/process.js';

export { InlineRunner, ProcessRunner } from './runner/BackgroundRunner.js';
export type { ProcessRunnerOptions, SpawnFn, SpawnedProcess } from './runner/BackgroundRunner.js';

export { RequestHandler, DEFAULT_RETRY_BACKOFF_MS } from './handler/RequestHandler.js';
export type {
  ItemFilter,
  RefreshSkipReason,
  RequestHandlerOptions,
} from './handler/RequestHandler.js';

export { runRefresh, DEFAULT_FETCH_TIMEOUT_MS } from './refresh.js';
export type { RefreshOptions, RefreshOutcome } from './refresh.js';

export { withTimeout } from './utils/timeout.js';
export { createChildLogger, createLogger, getLogger, setLogger } from './logging/logger.js';
export type { Logger, LoggerFactoryOptions } from './logging/logger.js';
