/**
 * Log levels understood by the client. `silent` turns logging off.
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/**
 * Port interface for logging.
 *
 * Use cases log each call at info and failures at error; the REST client
 * logs every request and response at debug.
 */
export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;

  debug(message: string, data?: Record<string, unknown>): void;

  info(message: string, data?: Record<string, unknown>): void;

  warn(message: string, data?: Record<string, unknown>): void;

  /**
   * Log at error level. An `Error` is serialized with its stack; any other
   * value is attached as `error`.
   */
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void;

  /**
   * Create a child logger that adds `bindings` to every entry
   */
  child(bindings: Record<string, unknown>): ILogger;
}
