/**
 * Structured logger interface
 *
 * Runners report every plugin failure through this interface. For selector
 * failures it is the only record that exists.
 */
export interface Logger {
  /**
   * Debug level log (only shown in verbose mode)
   */
  debug(message: string, meta?: Record<string, unknown>): void;

  /**
   * Info level log
   */
  info(message: string, meta?: Record<string, unknown>): void;

  /**
   * Warning level log
   */
  warn(message: string, meta?: Record<string, unknown>): void;

  /**
   * Error level log
   */
  error(message: string, meta?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context
   */
  child(bindings: Record<string, unknown>): Logger;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger that drops everything.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => noopLogger,
};
