#!/usr/bin/env tsx
import { existsSync, writeFileSync } from 'node:fs';
import path from 'node:path';

import { Command, InvalidArgumentError } from 'commander';

import { createLogger, errorMessage, getLogger, setLogger } from '@keystroke/core';

import { loadConfigFiles, readEnvConfig, resolveSettings } from './lib/config.js';
import { toFeedback } from './lib/feedback.js';
import {
  CACHE_KEY,
  createListHandler,
  createProcessRunner,
  createRuntime,
  openItem,
  runUpdate,
} from './lib/runtime.js';
import type { Runtime } from './lib/runtime.js';

type GlobalOptions = {
  config?: string;
  cacheDir?: string;
  maxAge?: number;
  verbose?: boolean;
};

async function main(): Promise<void> {
  const cwd = process.cwd();

  const parseMinutes = (value: string): number => {
    const minutes = Number(value);
    if (!Number.isFinite(minutes) || minutes < 0) {
      throw new InvalidArgumentError('Expected a non-negative number of minutes.');
    }
    return minutes;
  };

  const program = new Command();
  program
    .name('keystroke')
    .description('Instant, self-refreshing list filter backed by a slow external source')
    .version('0.1.0')
    .option('--config <file>', 'Settings file (default: nearest keystroke.config.json)')
    .option('--cache-dir <dir>', 'Cache directory')
    .option('--max-age <minutes>', 'Refresh lists older than this', parseMinutes)
    .option('--verbose', 'Debug logging', false);

  const loadRuntime = (): Runtime => {
    const opts = program.opts<GlobalOptions>();
    const env = readEnvConfig(process.env);
    const { config, sources } = loadConfigFiles({ cwd, env, explicitPath: opts.config });
    const settings = resolveSettings(config, env, {
      cacheDir: opts.cacheDir,
      maxAgeMinutes: opts.maxAge,
    });

    const logger = createLogger({ level: opts.verbose ? 'debug' : undefined, file: settings.logFile });
    setLogger(logger);
    logger.debug({ sources, cacheDir: settings.cacheDir, maxAgeMs: settings.maxAgeMs }, 'settings loaded');

    return createRuntime(settings, { logger });
  };

  program
    .command('list')
    .description('Print matching lists as script-filter JSON')
    .argument('[query]', 'Filter text', '')
    .action(async (query: string) => {
      const runtime = loadRuntime();
      const opts = program.opts<GlobalOptions>();
      const runner = createProcessRunner(runtime, {
        execPath: process.execPath,
        execArgv: process.execArgv,
        script: process.argv[1] ?? path.join(cwd, 'cli.js'),
        forwardArgs: [
          ...(opts.config ? ['--config', path.resolve(cwd, opts.config)] : []),
          ...(opts.cacheDir ? ['--cache-dir', runtime.settings.cacheDir] : []),
          ...(opts.verbose ? ['--verbose'] : []),
        ],
      });

      const response = await createListHandler(runtime, runner).handle(query);
      const feedback = toFeedback(response, { rerunDelayMs: runtime.settings.rerunDelayMs });
      process.stdout.write(JSON.stringify(feedback) + '\n');
    });

  program
    .command('update')
    .description('Fetch lists now and store them in the cache')
    .option('--key <key>', 'Cache key to refresh', CACHE_KEY)
    .action(async (options: { key: string }) => {
      const runtime = loadRuntime();
      const result = await runUpdate(runtime, options.key);
      runtime.logger.info({ key: options.key, result }, 'update finished');
      process.exitCode = result === 'failed' ? 1 : 0;
    });

  program
    .command('open')
    .description('Open a list by id')
    .argument('<id>', 'List id')
    .action(async (id: string) => {
      const runtime = loadRuntime();
      await openItem(runtime, id);
    });

  program
    .command('clear')
    .description('Delete cached lists and any failure marker')
    .action(async () => {
      const runtime = loadRuntime();
      await runtime.store.invalidate(CACHE_KEY);
      await runtime.store.clearFailure(CACHE_KEY);
      console.log(`Cleared cache in ${runtime.settings.cacheDir}`);
    });

  program
    .command('init')
    .description('Write a settings file template')
    .option('--path <file>', 'Where to write config', 'keystroke.config.json')
    .option('--force', 'Overwrite an existing file', false)
    .action((opts: { path: string; force: boolean }) => {
      const outPath = path.resolve(cwd, opts.path);
      if (existsSync(outPath) && !opts.force) {
        console.error(`${outPath} already exists (use --force to overwrite)`);
        process.exit(2);
      }
      const template = {
        accounts: [],
        maxAgeMinutes: 10,
        rerunDelayMs: 500,
        fetchTimeoutMs: 30_000,
        retryBackoffMs: 30_000,
      };
      writeFileSync(outPath, JSON.stringify(template, null, 2) + '\n', 'utf8');
      console.log(`Wrote ${outPath}`);
    });

  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  getLogger().error({ err }, 'keystroke failed');
  console.error(errorMessage(err));
  process.exit(2);
});
