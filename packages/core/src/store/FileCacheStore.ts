import { readFile, unlink } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import type { CacheEntry, CacheStore, FailureRecord } from '../types/cache.js';

import { StorageUnavailableError, errorCode, errorMessage } from '../errors.js';
import { writeFileAtomic } from '../utils/atomicWrite.js';
import { keyToFileStem } from '../utils/keys.js';
import { isFresh } from './freshness.js';

export interface FileCacheStoreOptions<T> {
  /** Directory shared by every process that uses the cache. */
  dir: string;

  /**
   * Schema for the cached payload. Stored records that do not match are
   * reported as `StorageUnavailableError`.
   */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

const entryShellSchema = z.object({
  key: z.string(),
  fetchedAt: z.number(),
  payload: z.unknown(),
});

const failureSchema = z.object({
  key: z.string(),
  failedAt: z.number(),
  message: z.string(),
});

/**
 * File-backed cache store: one JSON record per key.
 *
 * Layout inside `dir`:
 * - `<stem>.json`: the entry (`{ key, payload, fetchedAt }`)
 * - `<stem>.failure.json`: marker from the last failed refresh
 *
 * Writes go through a temp file + rename, so concurrent readers in other
 * processes never see a partially written entry.
 */
export class FileCacheStore<T> implements CacheStore<T> {
  private readonly dir: string;
  private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;

  constructor(options: FileCacheStoreOptions<T>) {
    this.dir = options.dir;
    this.schema = options.schema;
  }

  async read(key: string): Promise<CacheEntry<T> | null> {
    const raw = await this.readRecord(key, this.entryPath(key));
    if (raw === null) return null;

    const shell = entryShellSchema.safeParse(raw);
    if (!shell.success) {
      throw new StorageUnavailableError(key, 'stored entry is malformed', { cause: shell.error });
    }

    const payload = this.schema.safeParse(shell.data.payload);
    if (!payload.success) {
      throw new StorageUnavailableError(key, 'stored payload does not match schema', {
        cause: payload.error,
      });
    }

    return { key: shell.data.key, fetchedAt: shell.data.fetchedAt, payload: payload.data };
  }

  async write(key: string, payload: T, now: number): Promise<CacheEntry<T>> {
    const entry: CacheEntry<T> = { key, payload, fetchedAt: now };
    await this.writeRecord(key, this.entryPath(key), entry);
    return entry;
  }

  isFresh(entry: CacheEntry<T>, maxAgeMs: number, now: number): boolean {
    return isFresh(entry, maxAgeMs, now);
  }

  async invalidate(key: string): Promise<void> {
    await this.removeRecord(key, this.entryPath(key));
  }

  async recordFailure(key: string, message: string, now: number): Promise<void> {
    const record: FailureRecord = { key, failedAt: now, message };
    await this.writeRecord(key, this.failurePath(key), record);
  }

  async lastFailure(key: string): Promise<FailureRecord | null> {
    const raw = await this.readRecord(key, this.failurePath(key));
    if (raw === null) return null;

    const parsed = failureSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }

  async clearFailure(key: string): Promise<void> {
    await this.removeRecord(key, this.failurePath(key));
  }

  /** Absolute path of the entry file for `key`. */
  entryPath(key: string): string {
    return path.join(this.dir, `${keyToFileStem(key)}.json`);
  }

  private failurePath(key: string): string {
    return path.join(this.dir, `${keyToFileStem(key)}.failure.json`);
  }

  private async readRecord(key: string, filePath: string): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(filePath, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return null;
      throw new StorageUnavailableError(key, errorMessage(error), { cause: error });
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new StorageUnavailableError(key, 'stored record is not valid JSON', { cause: error });
    }
  }

  private async writeRecord(key: string, filePath: string, value: unknown): Promise<void> {
    const text = JSON.stringify(value);
    try {
      await writeFileAtomic(filePath, text);
    } catch (error) {
      throw new StorageUnavailableError(key, errorMessage(error), { cause: error });
    }
  }

  private async removeRecord(key: string, filePath: string): Promise<void> {
    try {
      await unlink(filePath);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return;
      throw new StorageUnavailableError(key, errorMessage(error), { cause: error });
    }
  }
}
