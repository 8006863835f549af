import { pino } from 'pino';
import type { DestinationStream, Logger as PinoLogger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  /** Write JSON lines here instead of stdout */
  destination?: DestinationStream;
}

/**
 * Logger wrapper for the perceptron engine
 */
export class Logger {
  private static silentInstance: Logger | null = null;
  private pino: PinoLogger;

  constructor(options: LoggerOptions = {}, instance?: PinoLogger) {
    this.pino = instance ?? createPino(options);
  }

  /**
   * Shared logger that writes nothing
   */
  static silent(): Logger {
    Logger.silentInstance ??= new Logger({ level: 'silent' });
    return Logger.silentInstance;
  }

  get level(): string {
    return this.pino.level;
  }

  child(bindings: Record<string, unknown>): Logger {
    return new Logger({}, this.pino.child(bindings));
  }

  debug(message: string, data?: unknown): void {
    if (data) {
      this.pino.debug(data, message);
    } else {
      this.pino.debug(message);
    }
  }

  info(message: string, data?: unknown): void {
    if (data) {
      this.pino.info(data, message);
    } else {
      this.pino.info(message);
    }
  }

  warn(message: string, data?: unknown): void {
    if (data) {
      this.pino.warn(data, message);
    } else {
      this.pino.warn(message);
    }
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, message);
    } else if (error) {
      this.pino.error(error, message);
    } else {
      this.pino.error(message);
    }
  }
}

function createPino(options: LoggerOptions): PinoLogger {
  const config = {
    name: options.name ?? 'perceptron',
    level: options.level ?? 'info',
  };

  if (options.destination) {
    return pino(config, options.destination);
  }

  return pino({
    ...config,
    transport: process.env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  });
}
