import { writeFileSync } from 'node:fs';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { InlineRunner, createLogger } from '@keystroke/core';
import type { SpawnFn } from '@keystroke/core';

import { resolveSettings } from './config.js';
import type { Settings } from './config.js';
import type { ExecFn } from './fetcher.js';
import type { ListItem } from './items.js';
import { CACHE_KEY, createListHandler, createProcessRunner, createRuntime, openItem, runUpdate } from './runtime.js';

const logger = createLogger({ level: 'silent' });

const lists: ListItem[] = [
  { account: 'iCloud', name: 'Groceries', id: 'x-1' },
  { account: 'On My Mac', name: 'Garden', id: 'x-2' },
];

describe('runtime', () => {
  let dir: string;
  let settings: Settings;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'keystroke-runtime-'));
    settings = resolveSettings({ accounts: ['iCloud'] }, { KEYSTROKE_CACHE_DIR: dir });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('runUpdate', () => {
    it('fetches, stores and releases the lock', async () => {
      const runtime = createRuntime(settings, { fetcher: { fetch: async () => lists }, pid: 900, logger });

      expect(await runUpdate(runtime, CACHE_KEY, { ppid: 1 })).toBe('updated');
      expect((await runtime.store.read(CACHE_KEY))?.payload).toEqual(lists);
      expect(await runtime.coordinator.isLocked(CACHE_KEY)).toBe(false);
    });

    it('takes over a lock held by the parent invocation', async () => {
      const parent = createRuntime(settings, { pid: 800, isAlive: () => true, logger });
      await parent.coordinator.tryAcquire(CACHE_KEY);

      const fetch = vi.fn(async () => lists);
      const child = createRuntime(settings, { fetcher: { fetch }, pid: 900, isAlive: () => true, logger });

      expect(await runUpdate(child, CACHE_KEY, { ppid: 800 })).toBe('updated');
      expect(fetch).toHaveBeenCalledTimes(1);
      expect(await child.coordinator.isLocked(CACHE_KEY)).toBe(false);
    });

    it('backs off when an unrelated process is refreshing', async () => {
      const other = createRuntime(settings, { pid: 700, isAlive: () => true, logger });
      await other.coordinator.tryAcquire(CACHE_KEY);

      const fetch = vi.fn(async () => lists);
      const runtime = createRuntime(settings, { fetcher: { fetch }, pid: 900, isAlive: () => true, logger });

      expect(await runUpdate(runtime, CACHE_KEY, { ppid: 800 })).toBe('busy');
      expect(fetch).not.toHaveBeenCalled();
      expect(await runtime.coordinator.holder(CACHE_KEY)).toMatchObject({ pid: 700 });
    });

    it('reports a failed fetch', async () => {
      const runtime = createRuntime(settings, {
        fetcher: {
          fetch: async () => {
            throw new Error('Reminders is not running');
          },
        },
        pid: 900,
        logger,
      });

      expect(await runUpdate(runtime, CACHE_KEY, { ppid: 1 })).toBe('failed');
      expect((await runtime.store.lastFailure(CACHE_KEY))?.message).toBe('Reminders is not running');
    });
  });

  describe('createListHandler', () => {
    it('filters cached lists by account and query', async () => {
      const runtime = createRuntime(settings, { fetcher: { fetch: async () => lists }, logger });
      await runtime.store.write(CACHE_KEY, lists, Date.now());
      const runner = new InlineRunner({ logger });

      const response = await createListHandler(runtime, runner).handle('gro');

      expect(response.items).toEqual([{ account: 'iCloud', name: 'Groceries', id: 'x-1' }]);
      expect(response.rerun).toBe(false);
    });

    it('refreshes an empty cache in the background', async () => {
      const runtime = createRuntime(settings, { fetcher: { fetch: async () => lists }, logger });
      const runner = new InlineRunner({ logger });
      const handler = createListHandler(runtime, runner);

      expect(await handler.handle('')).toEqual({ items: [], rerun: true, status: 'empty' });
      await runner.idle();

      const next = await handler.handle('');
      expect(next.status).toBe('fresh');
      expect(next.rerun).toBe(false);
      expect(next.items.map((i) => i.id)).toEqual(['x-1']);
    });
  });

  describe('createProcessRunner', () => {
    it('re-invokes the CLI with the update command and hands the lock to the child', async () => {
      const runtime = createRuntime(settings, { pid: 800, isAlive: () => true, logger });
      await runtime.coordinator.tryAcquire(CACHE_KEY);
      const spawn = vi.fn<SpawnFn>(() => ({ pid: 4242, unref: () => undefined, on: () => undefined }));
      const runner = createProcessRunner(
        runtime,
        {
          execPath: '/usr/local/bin/node',
          execArgv: ['--import', 'tsx'],
          script: '/opt/keystroke/cli.ts',
          forwardArgs: ['--config', '/etc/keystroke.json'],
        },
        { spawn },
      );

      await runner.spawnDetached({ key: CACHE_KEY, run: async () => undefined });

      expect(spawn).toHaveBeenCalledWith(
        '/usr/local/bin/node',
        ['--import', 'tsx', '/opt/keystroke/cli.ts', '--config', '/etc/keystroke.json', 'update', '--key', 'lists'],
        expect.objectContaining({ detached: true }),
      );
      expect(await runtime.coordinator.holder(CACHE_KEY)).toMatchObject({ pid: 4242 });
    });

    it('leaves the lock alone when it changed hands before the hand-off', async () => {
      const runtime = createRuntime(settings, { pid: 800, isAlive: () => true, logger });
      await runtime.coordinator.tryAcquire(CACHE_KEY);
      const lockPath = runtime.coordinator.lockPath(CACHE_KEY);
      const spawn = vi.fn<SpawnFn>(() => {
        // The child finished and another invocation took the lock meanwhile.
        writeFileSync(lockPath, JSON.stringify({ key: CACHE_KEY, pid: 700, acquiredAt: Date.now() }));
        return { pid: 4242, unref: () => undefined, on: () => undefined };
      });
      const runner = createProcessRunner(
        runtime,
        { execPath: '/usr/local/bin/node', execArgv: [], script: '/opt/keystroke/cli.js' },
        { spawn },
      );

      await runner.spawnDetached({ key: CACHE_KEY, run: async () => undefined });

      expect(await runtime.coordinator.holder(CACHE_KEY)).toMatchObject({ pid: 700 });
    });
  });

  describe('openItem', () => {
    it('appends the id to the open command', async () => {
      const exec = vi.fn<ExecFn>(async () => ({ stdout: '', stderr: '' }));
      const runtime = createRuntime(
        { ...settings, openCommand: ['/usr/bin/osascript', 'open.applescript'] },
        { exec, logger },
      );

      await openItem(runtime, 'x-1');

      expect(exec).toHaveBeenCalledWith('/usr/bin/osascript', ['open.applescript', 'x-1']);
    });

    it('treats printed output as a failure message', async () => {
      const exec: ExecFn = async () => ({ stdout: 'Failed to open list x-9\n', stderr: '' });
      const runtime = createRuntime(settings, { exec, logger });

      await expect(openItem(runtime, 'x-9')).rejects.toThrow('Failed to open list x-9');
    });
  });
});
