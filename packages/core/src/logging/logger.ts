/**
 * Structured logger factory.
 *
 * Interactive runs log JSON lines to a file so nothing interleaves with the
 * terminal UI. Components receive the logger through their constructors and
 * derive child loggers with a `module` field.
 */

import pino, { type DestinationStream, type Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggerOptions {
  level?: LogLevel;
  /** Append JSON lines to this file, creating its directory. */
  file?: string;
  /** Explicit destination; wins over `file`. */
  stream?: DestinationStream;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const destination =
    options.stream ??
    (options.file ? pino.destination({ dest: options.file, mkdir: true, sync: true }) : undefined);

  const config = {
    name: options.name ?? 'parley',
    level: options.level ?? 'info',
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(config, destination) : pino(config);
}

/** Logger that drops everything. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

export type { Logger };
