/**
 * Shared fixtures for runtime tests
 */

import type { Logger, LogLevel } from '@publishkit/plugin-contracts';

export interface LogRecord {
  level: LogLevel;
  message: string;
  meta: Record<string, unknown>;
}

/**
 * Logger that keeps every record (children write to the same list).
 */
export function createRecordingLogger(bindings: Record<string, unknown> = {}, records: LogRecord[] = []): {
  logger: Logger;
  records: LogRecord[];
} {
  const write = (level: LogLevel) => (message: string, meta?: Record<string, unknown>) => {
    records.push({ level, message, meta: { ...bindings, ...meta } });
  };

  const logger: Logger = {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    child: (childBindings) => createRecordingLogger({ ...bindings, ...childBindings }, records).logger,
  };

  return { logger, records };
}
