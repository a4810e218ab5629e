/**
 * @module @publishkit/plugin-runtime/logging
 * Console-backed implementation of the pipeline Logger
 */

import type { Logger, LogLevel } from '@publishkit/plugin-contracts';

type Fields = Record<string, unknown>;

export type LoggerLevel = LogLevel | 'silent';

const LEVEL_ORDER: Record<LoggerLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Receives one formatted line per record.
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface ConsoleLoggerOptions {
  /** Minimum level written. Default: 'info' */
  level?: LoggerLevel;
  /** Fields merged into every record */
  bindings?: Fields;
  /** Default: the console method of the record's level */
  sink?: LogSink;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};

/**
 * Format a record as `[level] message {"key":"value"}`.
 * The JSON part is omitted when there are no fields.
 */
export function formatLogLine(level: LogLevel, message: string, fields?: Fields): string {
  if (!fields || Object.keys(fields).length === 0) {
    return `[${level}] ${message}`;
  }
  return `[${level}] ${message} ${stringifyFields(fields)}`;
}

function stringifyFields(fields: Fields): string {
  try {
    return JSON.stringify(fields);
  } catch (error) {
    // Circular or BigInt values
    return JSON.stringify({ unserializable: error instanceof Error ? error.message : String(error) });
  }
}

/**
 * Create a logger that writes formatted lines to the console (or `sink`).
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ level: 'debug' }).child({ run: 'r1' });
 * logger.info('Selecting with SelectObjectSets');
 * // [info] Selecting with SelectObjectSets {"run":"r1"}
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const sink = options.sink ?? consoleSink;
  const bindings = options.bindings ?? {};

  function write(level: LogLevel, message: string, meta?: Fields): void {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    sink(level, formatLogLine(level, message, { ...bindings, ...meta }));
  }

  return {
    debug(message, meta) {
      write('debug', message, meta);
    },
    info(message, meta) {
      write('info', message, meta);
    },
    warn(message, meta) {
      write('warn', message, meta);
    },
    error(message, meta) {
      write('error', message, meta);
    },
    child(childBindings) {
      return createConsoleLogger({
        level: options.level,
        sink,
        bindings: { ...bindings, ...childBindings },
      });
    },
  };
}
