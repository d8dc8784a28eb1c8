import {
  FileCacheStore,
  ProcessRunner,
  RefreshCoordinator,
  RequestHandler,
  createChildLogger,
  runRefresh,
} from '@keystroke/core';
import type { BackgroundRunner, DataFetcher, Logger, SpawnFn } from '@keystroke/core';

import type { Settings } from './config.js';
import { CommandFetcher, defaultExec } from './fetcher.js';
import type { ExecFn } from './fetcher.js';
import { filterItems, listItemsSchema } from './items.js';
import type { ListItem } from './items.js';

/** Cache key for the lists. */
export const CACHE_KEY = 'lists';

/**
 * Everything one invocation needs, built from resolved settings.
 */
export interface Runtime {
  settings: Settings;
  store: FileCacheStore<ListItem[]>;
  coordinator: RefreshCoordinator;
  fetcher: DataFetcher<ListItem[]>;
  exec: ExecFn;
  pid: number;
  logger: Logger;
}

export interface RuntimeOverrides {
  fetcher?: DataFetcher<ListItem[]>;
  exec?: ExecFn;
  pid?: number;
  isAlive?: (pid: number) => boolean;
  logger?: Logger;
}

export function createRuntime(settings: Settings, overrides: RuntimeOverrides = {}): Runtime {
  const logger = overrides.logger ?? createChildLogger({ component: 'cli' });
  const exec = overrides.exec ?? defaultExec;
  const pid = overrides.pid ?? process.pid;

  return {
    settings,
    store: new FileCacheStore({ dir: settings.cacheDir, schema: listItemsSchema }),
    coordinator: new RefreshCoordinator({
      dir: settings.cacheDir,
      lockTtlMs: settings.lockTtlMs,
      pid,
      isAlive: overrides.isAlive,
      logger: logger.child({ component: 'refresh-lock' }),
    }),
    fetcher:
      overrides.fetcher ??
      new CommandFetcher({ command: settings.command, exec, logger: logger.child({ component: 'fetcher' }) }),
    exec,
    pid,
    logger,
  };
}

/**
 * How to re-invoke this CLI in a background process.
 */
export type SelfInvocation = {
  /** Node executable (`process.execPath`). */
  execPath: string;
  /** Node flags such as a TypeScript loader (`process.execArgv`). */
  execArgv: readonly string[];
  /** Entry script (`process.argv[1]`). */
  script: string;
  /** Global flags to forward, e.g. `['--config', 'file.json']`. */
  forwardArgs?: readonly string[];
};

/**
 * Runner that refreshes in a detached `update` child process and hands the
 * refresh lock over to it.
 */
export function createProcessRunner(
  runtime: Runtime,
  self: SelfInvocation,
  options: { spawn?: SpawnFn } = {},
): ProcessRunner {
  return new ProcessRunner({
    command: (key) => [
      self.execPath,
      ...self.execArgv,
      self.script,
      ...(self.forwardArgs ?? []),
      'update',
      '--key',
      key,
    ],
    onSpawned: async (key, pid) => {
      // False when the child already finished and released the lock.
      await runtime.coordinator.handOff(key, pid);
    },
    logFile: runtime.settings.logFile,
    spawn: options.spawn,
    logger: runtime.logger.child({ component: 'process-runner' }),
  });
}

export function createListHandler(runtime: Runtime, runner: BackgroundRunner): RequestHandler<ListItem> {
  const { settings, store, coordinator } = runtime;

  return new RequestHandler<ListItem>({
    key: CACHE_KEY,
    store,
    lock: coordinator,
    runner,
    maxAgeMs: settings.maxAgeMs,
    retryBackoffMs: settings.retryBackoffMs,
    filter: (items, query) => filterItems(items, query, settings.accounts),
    createJob: (key) => ({
      key,
      run: () => runRefresh({
        key,
        fetcher: runtime.fetcher,
        store,
        lock: coordinator,
        timeoutMs: settings.fetchTimeoutMs,
        logger: runtime.logger.child({ component: 'refresh' }),
      }),
    }),
    logger: runtime.logger.child({ component: 'request-handler' }),
  });
}

export type UpdateResult = 'updated' | 'failed' | 'busy';

/**
 * Refresh `key` in the foreground.
 *
 * A lock held by this process or by its parent (the invocation that spawned
 * it) is taken over; a lock held by anyone else means another refresh is
 * already running.
 */
export async function runUpdate(
  runtime: Runtime,
  key: string = CACHE_KEY,
  options: { ppid?: number } = {},
): Promise<UpdateResult> {
  const { coordinator, logger, pid } = runtime;
  const ppid = options.ppid ?? process.ppid;

  const holder = await coordinator.holder(key);
  if (holder && holder.pid === ppid) {
    if (!(await coordinator.handOff(key, pid, { from: ppid }))) {
      logger.info({ key }, 'refresh lock changed hands before take-over');
      return 'busy';
    }
  } else if (holder && holder.pid !== pid) {
    logger.info({ key, holder: holder.pid }, 'refresh already running');
    return 'busy';
  } else if (!holder && !(await coordinator.tryAcquire(key))) {
    logger.info({ key }, 'refresh already running');
    return 'busy';
  }

  const outcome = await runRefresh({
    key,
    fetcher: runtime.fetcher,
    store: runtime.store,
    lock: coordinator,
    timeoutMs: runtime.settings.fetchTimeoutMs,
    logger: logger.child({ component: 'refresh' }),
  });
  return outcome.ok ? 'updated' : 'failed';
}

/**
 * Open the list with `id` using the configured open command.
 *
 * The command signals failure by exiting non-zero or by printing a message.
 */
export async function openItem(runtime: Runtime, id: string): Promise<void> {
  const [file, ...args] = runtime.settings.openCommand;
  if (!file) throw new Error('No open command configured');

  runtime.logger.debug({ id }, 'opening list');
  const { stdout } = await runtime.exec(file, [...args, id]);
  const message = stdout.trim();
  if (message) throw new Error(message);
}
