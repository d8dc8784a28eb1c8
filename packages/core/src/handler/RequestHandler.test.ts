import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { DataFetcher } from '../types/fetch.js';

import { LockUnavailableError, StorageUnavailableError } from '../errors.js';
import { RefreshCoordinator } from '../lock/RefreshCoordinator.js';
import { createLogger } from '../logging/logger.js';
import { runRefresh } from '../refresh.js';
import { InlineRunner } from '../runner/BackgroundRunner.js';
import { MemoryCacheStore } from '../store/MemoryCacheStore.js';
import { RequestHandler } from './RequestHandler.js';
import type { RequestHandlerOptions } from './RequestHandler.js';

const logger = createLogger({ level: 'silent' });

type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
};

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('RequestHandler', () => {
  let dir: string;
  let clock: number;
  let store: MemoryCacheStore<string[]>;
  let lock: RefreshCoordinator;
  let runner: InlineRunner;

  function createHandler(
    fetcher: DataFetcher<string[]>,
    overrides: Partial<RequestHandlerOptions<string>> = {},
  ) {
    return new RequestHandler<string>({
      key: 'lists',
      store,
      lock,
      runner,
      maxAgeMs: 600_000,
      retryBackoffMs: 0,
      createJob: (key) => ({
        key,
        run: () => runRefresh({ key, fetcher, store, lock, now: () => clock, logger }),
      }),
      logger,
      ...overrides,
    });
  }

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'keystroke-handler-'));
    clock = 0;
    store = new MemoryCacheStore<string[]>();
    lock = new RefreshCoordinator({ dir, logger });
    runner = new InlineRunner({ logger });
  });

  afterEach(async () => {
    await runner.idle();
    await rm(dir, { recursive: true, force: true });
  });

  it('serves fresh data, refreshes stale data once, and picks up the result', async () => {
    await store.write('lists', ['Groceries'], 0);
    const pending = deferred<string[]>();
    const fetch = vi.fn(() => pending.promise);
    const handler = createHandler({ fetch });
    const spawned = vi.fn();
    const skipped = vi.fn();
    handler.on('refresh:spawned', spawned);
    handler.on('refresh:skipped', skipped);

    expect(await handler.handle('', 300_000)).toEqual({
      items: ['Groceries'],
      rerun: false,
      status: 'fresh',
      fetchedAt: 0,
    });
    expect(spawned).not.toHaveBeenCalled();

    expect(await handler.handle('', 700_000)).toEqual({
      items: ['Groceries'],
      rerun: true,
      status: 'stale',
      fetchedAt: 0,
    });
    expect(spawned).toHaveBeenCalledTimes(1);

    expect(await handler.handle('', 701_000)).toEqual({
      items: ['Groceries'],
      rerun: true,
      status: 'stale',
      fetchedAt: 0,
    });
    expect(spawned).toHaveBeenCalledTimes(1);
    expect(skipped).toHaveBeenCalledWith('lists', 'locked');

    clock = 702_000;
    pending.resolve(['Groceries', 'Packing']);
    await runner.idle();

    expect(await handler.handle('', 705_000)).toEqual({
      items: ['Groceries', 'Packing'],
      rerun: false,
      status: 'fresh',
      fetchedAt: 702_000,
    });
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(await lock.isLocked('lists')).toBe(false);
  });

  it('reports "no data" and keeps asking for reruns while the fetcher keeps failing', async () => {
    const fetch = vi.fn(async (): Promise<string[]> => {
      throw new Error('Reminders is not running');
    });
    const handler = createHandler({ fetch });

    for (const now of [1_000, 2_000, 3_000]) {
      clock = now;
      expect(await handler.handle('', now)).toEqual({ items: [], rerun: true, status: 'empty' });
      await runner.idle();
      expect(await lock.isLocked('lists')).toBe(false);
    }

    expect(fetch).toHaveBeenCalledTimes(3);
  });

  it('answers without waiting for a slow fetch', async () => {
    const pending = deferred<string[]>();
    const handler = createHandler({ fetch: () => pending.promise });

    const response = await handler.handle('', 1_000);

    expect(response).toEqual({ items: [], rerun: true, status: 'empty' });
    expect(runner.size).toBe(1);
    pending.resolve([]);
  });

  it('backs off after a failed refresh', async () => {
    const fetch = vi.fn(async (): Promise<string[]> => {
      throw new Error('timeout talking to Reminders');
    });
    const handler = createHandler({ fetch }, { retryBackoffMs: 30_000 });
    const skipped = vi.fn();
    handler.on('refresh:skipped', skipped);

    clock = 1_000;
    await handler.handle('', 1_000);
    await runner.idle();
    expect(fetch).toHaveBeenCalledTimes(1);

    const during = await handler.handle('', 20_000);
    expect(during.rerun).toBe(true);
    expect(skipped).toHaveBeenCalledWith('lists', 'backoff');
    expect(fetch).toHaveBeenCalledTimes(1);

    clock = 31_000;
    await handler.handle('', 31_000);
    await runner.idle();
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('treats max age 0 as always stale', async () => {
    await store.write('lists', ['Groceries'], 1_000);
    const handler = createHandler({ fetch: async () => ['Groceries'] }, { maxAgeMs: 0 });

    const response = await handler.handle('', 1_000);
    expect(response.rerun).toBe(true);
    expect(response.status).toBe('stale');
  });

  it('filters the cached items for the query', async () => {
    await store.write('lists', ['Groceries', 'Work', 'Gardening'], 0);
    const handler = createHandler(
      { fetch: async () => [] },
      { filter: (items, query) => items.filter((i) => i.toLowerCase().includes(query)) },
    );

    const response = await handler.handle('gar', 10);
    expect(response.items).toEqual(['Gardening']);
  });

  it('degrades an unreadable cache to "no data"', async () => {
    vi.spyOn(store, 'read').mockRejectedValue(new StorageUnavailableError('lists', 'EIO'));
    const handler = createHandler({ fetch: async () => [] });

    expect(await handler.handle('', 1_000)).toEqual({ items: [], rerun: true, status: 'empty' });
  });

  it('does not spawn when the lock cannot be checked', async () => {
    vi.spyOn(lock, 'tryAcquire').mockRejectedValue(new LockUnavailableError('lists'));
    const fetch = vi.fn(async () => []);
    const handler = createHandler({ fetch });
    const skipped = vi.fn();
    handler.on('refresh:skipped', skipped);

    const response = await handler.handle('', 1_000);

    expect(response.rerun).toBe(true);
    expect(skipped).toHaveBeenCalledWith('lists', 'lock-error');
    expect(runner.size).toBe(0);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('releases the lock when the refresh cannot be launched', async () => {
    vi.spyOn(runner, 'spawnDetached').mockRejectedValue(new Error('spawn ENOENT'));
    const handler = createHandler({ fetch: async () => [] });

    const response = await handler.handle('', 1_000);

    expect(response.rerun).toBe(true);
    expect(await lock.isLocked('lists')).toBe(false);
  });

  it('rejects a negative max age', () => {
    expect(() => createHandler({ fetch: async () => [] }, { maxAgeMs: -1 })).toThrow(RangeError);
  });
});
