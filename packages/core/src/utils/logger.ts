import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];

function levelFromEnv(): LogLevel {
  const value = process.env.BLAST_RADIUS_LOG_LEVEL;
  return LOG_LEVELS.find(level => level === value) ?? 'info';
}

/**
 * Logger wrapper for the blast radius engine
 */
export class Logger {
  private readonly pino: pino.Logger;

  constructor(
    name: string = 'blast-radius',
    level: LogLevel = levelFromEnv(),
    instance?: pino.Logger,
  ) {
    this.pino = instance ?? pino({
      name,
      level,
      transport: process.env.BLAST_RADIUS_LOG_PRETTY === 'true'
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

  debug(message: string, data?: object): void {
    if (data) {
      this.pino.debug(data, message);
    } else {
      this.pino.debug(message);
    }
  }

  info(message: string, data?: object): void {
    if (data) {
      this.pino.info(data, message);
    } else {
      this.pino.info(message);
    }
  }

  warn(message: string, data?: object): void {
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
      this.pino.error({ detail: error }, message);
    } else {
      this.pino.error(message);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new Logger(undefined, undefined, this.pino.child(bindings));
  }
}

// Default logger instance
export const logger = new Logger();
