import pino from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export interface LoggerFactoryOptions {
  level?: string;
  name?: string;
  pretty?: boolean;
  /**
   * Append logs to this file instead of stderr. Stdout is reserved for the
   * feedback JSON the host reads.
   */
  file?: string;
}

function buildOptions(options: LoggerFactoryOptions): LoggerOptions {
  return {
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    name: options.name ?? 'keystroke',
  };
}

function buildDestination(options: LoggerFactoryOptions): DestinationStream {
  const file = options.file ?? process.env.KEYSTROKE_LOG_FILE;
  const pretty = options.pretty ?? process.env.LOG_PRETTY === 'true';

  if (pretty) {
    return pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: !file,
        translateTime: 'SYS:standard',
        singleLine: true,
        destination: file ?? 2,
      },
    });
  }

  // Invocations are short-lived; a sync destination makes sure nothing is lost on exit.
  return pino.destination({ dest: file ?? 2, sync: true, mkdir: Boolean(file) });
}

/**
 * Create a standalone logger (used by tests and embedders).
 */
export function createLogger(options: LoggerFactoryOptions = {}): Logger {
  return pino(buildOptions(options), buildDestination(options));
}

let rootLogger: Logger | null = null;

export function getLogger(options?: LoggerFactoryOptions): Logger {
  if (!rootLogger) {
    rootLogger = createLogger(options);
  }
  return rootLogger;
}

/**
 * Replace the root logger, e.g. after the CLI has parsed `--verbose`.
 */
export function setLogger(logger: Logger): void {
  rootLogger = logger;
}

export function createChildLogger(binding: Record<string, unknown>): Logger {
  return getLogger().child(binding);
}
