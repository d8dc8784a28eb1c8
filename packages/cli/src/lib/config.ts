import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import { ConfigError, DEFAULT_FETCH_TIMEOUT_MS, DEFAULT_RETRY_BACKOFF_MS } from '@keystroke/core';

/**
 * CLI configuration file names (searched upwards from cwd).
 */
export const CONFIG_FILES = ['.keystrokerc.json', 'keystroke.config.json'] as const;

const LISTS_SCRIPT = fileURLToPath(new URL('../../scripts/lists.applescript', import.meta.url));
const OPEN_SCRIPT = fileURLToPath(new URL('../../scripts/open.applescript', import.meta.url));

export const DEFAULT_MAX_AGE_MINUTES = 10;
export const DEFAULT_RERUN_DELAY_MS = 500;
export const DEFAULT_LOCK_TTL_MS = 2 * 60_000;
export const DEFAULT_LIST_COMMAND = ['/usr/bin/osascript', '-l', 'AppleScript', LISTS_SCRIPT];
export const DEFAULT_OPEN_COMMAND = ['/usr/bin/osascript', '-l', 'AppleScript', OPEN_SCRIPT];

const commandSchema = z.array(z.string().min(1)).min(1);

export const configFileSchema = z
  .object({
    /** Only show lists from these accounts (e.g. `iCloud`). Empty: all accounts. */
    accounts: z.array(z.string()).optional(),

    /** How long fetched lists stay fresh. `0` refreshes on every request. */
    maxAgeMinutes: z.number().min(0).optional(),

    /** Directory for cache entries, lock files and failure markers. */
    cacheDir: z.string().min(1).optional(),

    /** Command that prints the lists as `account<TAB>name<TAB>id` lines. */
    command: commandSchema.optional(),

    /** Command that opens a list; the list id is appended as the last argument. */
    openCommand: commandSchema.optional(),

    /** Delay before the host re-runs a query while data is being refreshed. */
    rerunDelayMs: z.number().int().positive().optional(),

    /** Abandon a fetch that takes longer than this. */
    fetchTimeoutMs: z.number().int().positive().optional(),

    /** Wait this long after a failed refresh before trying again. */
    retryBackoffMs: z.number().int().min(0).optional(),

    /** Locks older than this are treated as abandoned. */
    lockTtlMs: z.number().int().positive().optional(),

    /** Append logs (including the background refresh's) to this file. */
    logFile: z.string().min(1).optional(),
  })
  .strict();

/**
 * Settings file shape. Every field is optional; defaults fill the gaps.
 */
export type CliConfigFile = z.infer<typeof configFileSchema>;

const minutesFromEnv = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/, 'expected a non-negative number')
  .transform(Number);

const envSchema = z.object({
  CACHE_MINUTES: minutesFromEnv.optional(),
  KEYSTROKE_CACHE_DIR: z.string().min(1).optional(),
  KEYSTROKE_DATA_DIR: z.string().min(1).optional(),
  KEYSTROKE_LOG_FILE: z.string().min(1).optional(),
  alfred_workflow_cache: z.string().min(1).optional(),
  alfred_workflow_data: z.string().min(1).optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Flags that override the settings file and environment.
 */
export type ConfigOverrides = {
  cacheDir?: string;
  maxAgeMinutes?: number;
};

/**
 * Fully resolved settings used by one invocation.
 */
export type Settings = {
  cacheDir: string;
  maxAgeMs: number;
  accounts: string[];
  command: string[];
  openCommand: string[];
  rerunDelayMs: number;
  fetchTimeoutMs: number;
  retryBackoffMs: number;
  lockTtlMs: number;
  logFile?: string;
};

/**
 * Find a config file by walking up from the starting directory.
 */
export function findConfigFile(startDir: string): string | null {
  let dir = path.resolve(startDir);
  while (true) {
    for (const name of CONFIG_FILES) {
      const full = path.join(dir, name);
      if (existsSync(full)) return full;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Load and validate a JSON settings file.
 */
export function loadConfigFile(filePath: string): CliConfigFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}`, { cause: error });
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file ${filePath}: ${issues}`, { cause: parsed.error });
  }
  return parsed.data;
}

export function readEnvConfig(env: NodeJS.ProcessEnv): EnvConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`, { cause: parsed.error });
  }
  return parsed.data;
}

/**
 * Merge config objects with precedence: base < overrides.
 */
export function mergeConfig(base: CliConfigFile, overrides: CliConfigFile): CliConfigFile {
  return {
    accounts: overrides.accounts ?? base.accounts,
    maxAgeMinutes: overrides.maxAgeMinutes ?? base.maxAgeMinutes,
    cacheDir: overrides.cacheDir ?? base.cacheDir,
    command: overrides.command ?? base.command,
    openCommand: overrides.openCommand ?? base.openCommand,
    rerunDelayMs: overrides.rerunDelayMs ?? base.rerunDelayMs,
    fetchTimeoutMs: overrides.fetchTimeoutMs ?? base.fetchTimeoutMs,
    retryBackoffMs: overrides.retryBackoffMs ?? base.retryBackoffMs,
    lockTtlMs: overrides.lockTtlMs ?? base.lockTtlMs,
    logFile: overrides.logFile ?? base.logFile,
  };
}

/**
 * Collect the settings files that apply to an invocation:
 * `<data dir>/settings.json` first, then either the explicit `--config` file
 * or the nearest config file above `cwd`.
 */
export function loadConfigFiles(options: {
  cwd: string;
  env: EnvConfig;
  explicitPath?: string;
}): { config: CliConfigFile; sources: string[] } {
  const sources: string[] = [];
  let config: CliConfigFile = {};

  const dataDir = options.env.KEYSTROKE_DATA_DIR ?? options.env.alfred_workflow_data;
  if (dataDir) {
    const settingsPath = path.join(dataDir, 'settings.json');
    if (existsSync(settingsPath)) {
      config = mergeConfig(config, loadConfigFile(settingsPath));
      sources.push(settingsPath);
    }
  }

  const filePath = options.explicitPath
    ? path.resolve(options.cwd, options.explicitPath)
    : findConfigFile(options.cwd);
  if (filePath) {
    config = mergeConfig(config, loadConfigFile(filePath));
    sources.push(filePath);
  }

  return { config, sources };
}

/**
 * Resolve the effective settings. Precedence: defaults < file < env < flags.
 */
export function resolveSettings(
  file: CliConfigFile,
  env: EnvConfig,
  flags: ConfigOverrides = {},
): Settings {
  const maxAgeMinutes =
    flags.maxAgeMinutes ?? env.CACHE_MINUTES ?? file.maxAgeMinutes ?? DEFAULT_MAX_AGE_MINUTES;
  if (!(maxAgeMinutes >= 0)) {
    throw new ConfigError(`Max age must be a non-negative number of minutes (got ${maxAgeMinutes})`);
  }

  const cacheDir =
    flags.cacheDir ??
    env.KEYSTROKE_CACHE_DIR ??
    file.cacheDir ??
    env.alfred_workflow_cache ??
    path.join(homedir(), '.cache', 'keystroke');

  const logFile = env.KEYSTROKE_LOG_FILE ?? file.logFile;

  return {
    cacheDir: path.resolve(cacheDir),
    maxAgeMs: Math.round(maxAgeMinutes * 60_000),
    accounts: file.accounts ?? [],
    command: file.command ?? DEFAULT_LIST_COMMAND,
    openCommand: file.openCommand ?? DEFAULT_OPEN_COMMAND,
    rerunDelayMs: file.rerunDelayMs ?? DEFAULT_RERUN_DELAY_MS,
    fetchTimeoutMs: file.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS,
    retryBackoffMs: file.retryBackoffMs ?? DEFAULT_RETRY_BACKOFF_MS,
    lockTtlMs: file.lockTtlMs ?? DEFAULT_LOCK_TTL_MS,
    ...(logFile ? { logFile: path.resolve(logFile) } : {}),
  };
}
