import pino from 'pino';
import type { ILogger, LogLevel } from '../../domain/ports/ILogger.js';

const DEFAULT_NAME = 'conversation-client';
const DEFAULT_LEVEL: LogLevel = 'warn';

export interface PinoLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
  /** Write to this destination instead of stdout */
  destination?: pino.DestinationStream;
}

// Error instances go under pino's `err` key
function errorFields(error: unknown, data?: Record<string, unknown>): Record<string, unknown> {
  return error instanceof Error ? { err: error, ...data } : { error, ...data };
}

/**
 * Pino-based logger implementation
 */
export class PinoLogger implements ILogger {
  private readonly logger: pino.Logger;

  /**
   * @param existing - wrap an already configured pino logger (used by `child`)
   */
  constructor(options?: PinoLoggerOptions, existing?: pino.Logger) {
    this.logger = existing ?? PinoLogger.createPino(options);
  }

  private static createPino(options?: PinoLoggerOptions): pino.Logger {
    const transport = options?.pretty && !options.destination
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined;

    const pinoOptions: pino.LoggerOptions = {
      name: options?.name ?? DEFAULT_NAME,
      level: options?.level ?? DEFAULT_LEVEL,
      ...(transport && { transport }),
    };

    return options?.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
  }

  trace(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.trace(data, message);
    } else {
      this.logger.trace(message);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.debug(data, message);
    } else {
      this.logger.debug(message);
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.info(data, message);
    } else {
      this.logger.info(message);
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.warn(data, message);
    } else {
      this.logger.warn(message);
    }
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.logger.error(errorFields(error, data), message);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.logger.fatal(errorFields(error, data), message);
  }

  child(bindings: Record<string, unknown>): ILogger {
    return new PinoLogger(undefined, this.logger.child(bindings));
  }
}
