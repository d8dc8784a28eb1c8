import { spawn as nodeSpawn } from 'node:child_process';
import type { SpawnOptions } from 'node:child_process';
import { mkdir, open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';

import type { BackgroundJob, BackgroundRunner } from '../types/runner.js';

import { errorMessage } from '../errors.js';
import { createChildLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';

/**
 * Runs jobs as un-awaited promises in the current process.
 *
 * Suitable for hosts that stay alive between requests, and for tests. Job
 * errors are logged; they never reach the code that spawned the job.
 */
export class InlineRunner implements BackgroundRunner {
  private readonly pending = new Set<Promise<void>>();
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createChildLogger({ component: 'inline-runner' });
  }

  async spawnDetached(job: BackgroundJob): Promise<void> {
    const task = job
      .run()
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.error({ key: job.key, err: error }, 'background job failed');
        },
      )
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  /** Number of jobs that have not finished yet. */
  get size(): number {
    return this.pending.size;
  }

  /**
   * Resolve once every job started so far has finished.
   */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending]);
    }
  }
}

/**
 * The parts of a child process the runner uses.
 */
export interface SpawnedProcess {
  pid?: number;
  unref(): void;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => SpawnedProcess;

export interface ProcessRunnerOptions {
  /**
   * Build the command line that refreshes `key`: `[executable, ...args]`.
   */
  command: (key: string) => string[];

  /**
   * Called with the child's pid once it is running, so the refresh lock can
   * be handed over to it.
   */
  onSpawned?: (key: string, pid: number) => Promise<void>;

  /** Append the child's stdout/stderr to this file. Discarded when unset. */
  logFile?: string;

  env?: NodeJS.ProcessEnv;
  cwd?: string;

  /** `child_process.spawn` override used in tests. */
  spawn?: SpawnFn;

  logger?: Logger;
}

/**
 * Runs each job in a detached child process.
 *
 * The child is started in its own process group and unreferenced, so the
 * spawning invocation can exit (and the host can kill it) while the refresh
 * keeps going. `job.run` is never called here; the child performs the refresh
 * itself.
 */
export class ProcessRunner implements BackgroundRunner {
  private readonly options: ProcessRunnerOptions;
  private readonly spawn: SpawnFn;
  private readonly logger: Logger;

  constructor(options: ProcessRunnerOptions) {
    this.options = options;
    this.spawn = options.spawn ?? nodeSpawn;
    this.logger = options.logger ?? createChildLogger({ component: 'process-runner' });
  }

  async spawnDetached(job: BackgroundJob): Promise<void> {
    const [executable, ...args] = this.options.command(job.key);
    if (!executable) {
      throw new Error(`Empty refresh command for "${job.key}"`);
    }

    const output = await this.openLogFile();
    let pid: number | undefined;
    try {
      const child = this.spawn(executable, args, {
        detached: true,
        stdio: output ? ['ignore', output.fd, output.fd] : 'ignore',
        env: this.options.env ?? process.env,
        cwd: this.options.cwd,
      });
      child.on('error', (error) => {
        this.logger.error({ key: job.key, err: error }, 'refresh process failed to start');
      });
      child.unref();
      pid = child.pid;
    } finally {
      // The child has its own copy of the descriptor.
      await output?.close();
    }

    if (pid === undefined) {
      throw new Error(`Could not start refresh process for "${job.key}"`);
    }

    this.logger.info({ key: job.key, pid, command: executable }, 'refresh process started');
    await this.options.onSpawned?.(job.key, pid);
  }

  private async openLogFile(): Promise<FileHandle | null> {
    const { logFile } = this.options;
    if (!logFile) return null;
    try {
      await mkdir(path.dirname(logFile), { recursive: true });
      return await open(logFile, 'a');
    } catch (error) {
      this.logger.warn({ logFile, reason: errorMessage(error) }, 'cannot open refresh log file');
      return null;
    }
  }
}
