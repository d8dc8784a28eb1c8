import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

import { FetchFailedError, createChildLogger, errorMessage } from '@keystroke/core';
import type { DataFetcher, FetchOptions, Logger } from '@keystroke/core';

import type { ListItem } from './items.js';

const execFileAsync = promisify(execFile);

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export type ExecResult = { stdout: string; stderr: string };

/**
 * Run `file` with `args` and collect its output. Rejects on a non-zero exit.
 */
export type ExecFn = (
  file: string,
  args: readonly string[],
  options?: { signal?: AbortSignal },
) => Promise<ExecResult>;

export const defaultExec: ExecFn = async (file, args, options = {}) => {
  const { stdout, stderr } = await execFileAsync(file, [...args], {
    encoding: 'utf8',
    maxBuffer: MAX_OUTPUT_BYTES,
    signal: options.signal,
  });
  return { stdout, stderr };
};

/**
 * Parse the list command's output: one list per line, as
 * `account<TAB>name<TAB>id`. Blank lines are skipped; malformed lines are
 * logged and skipped.
 */
export function parseListOutput(output: string, logger?: Logger): ListItem[] {
  const items: ListItem[] = [];

  for (const line of output.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    const cells = trimmed.split('\t');
    const [account, name, id] = cells;
    if (cells.length !== 3 || account === undefined || name === undefined || id === undefined) {
      logger?.warn({ line: trimmed }, 'invalid line in list output');
      continue;
    }
    items.push({ account, name, id });
  }

  return items;
}

export interface CommandFetcherOptions {
  /** `[executable, ...args]` that prints the lists. */
  command: readonly string[];
  exec?: ExecFn;
  logger?: Logger;
}

/**
 * Fetches lists by running an external command (by default an AppleScript
 * via `osascript`) and parsing what it prints.
 */
export class CommandFetcher implements DataFetcher<ListItem[]> {
  private readonly command: readonly string[];
  private readonly exec: ExecFn;
  private readonly logger: Logger;

  constructor(options: CommandFetcherOptions) {
    this.command = options.command;
    this.exec = options.exec ?? defaultExec;
    this.logger = options.logger ?? createChildLogger({ component: 'command-fetcher' });
  }

  async fetch(options: FetchOptions = {}): Promise<ListItem[]> {
    const [file, ...args] = this.command;
    if (!file) throw new FetchFailedError('No list command configured');

    let result: ExecResult;
    try {
      result = await this.exec(file, args, { signal: options.signal });
    } catch (error) {
      throw new FetchFailedError(`${file} failed: ${errorMessage(error)}`, { cause: error });
    }

    if (result.stderr.trim()) {
      this.logger.debug({ stderr: result.stderr.trim() }, 'list command wrote to stderr');
    }

    const items = parseListOutput(result.stdout, this.logger);
    this.logger.debug({ count: items.length }, 'lists fetched');
    return items;
  }
}
