import { pino, destination, type Logger as PinoInstance, type LoggerOptions } from 'pino';
import { config } from '../config.js';
import type { Logger, LoggerLevel } from '../types/logger.types.js';

/** stderr; keeps diagnostics apart from a stdout pino pipeline that feeds the sink */
const DIAGNOSTICS_FD = 2;

class PinoLogger implements Logger {
  private readonly logger: PinoInstance;

  constructor(logger: PinoInstance) {
    this.logger = logger;
  }

  private data(args: unknown[]): Record<string, unknown> {
    if (args.length === 0) {
      return {};
    }
    if (args.length === 1 && typeof args[0] === 'object' && args[0] !== null && !Array.isArray(args[0])) {
      return { ...args[0] };
    }
    return { args };
  }

  private withError(error: Error | unknown, args: unknown[]): Record<string, unknown> {
    const data = this.data(args);
    if (error instanceof Error) {
      return { ...data, err: error };
    }
    if (error !== undefined) {
      return { ...data, error };
    }
    return data;
  }

  trace(message: string, ...args: unknown[]): void {
    this.logger.trace(this.data(args), message);
  }

  debug(message: string, ...args: unknown[]): void {
    this.logger.debug(this.data(args), message);
  }

  info(message: string, ...args: unknown[]): void {
    this.logger.info(this.data(args), message);
  }

  warn(message: string, ...args: unknown[]): void {
    this.logger.warn(this.data(args), message);
  }

  error(message: string, error?: Error | unknown, ...args: unknown[]): void {
    this.logger.error(this.withError(error, args), message);
  }

  fatal(message: string, error?: Error | unknown, ...args: unknown[]): void {
    this.logger.fatal(this.withError(error, args), message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new PinoLogger(this.logger.child(bindings));
  }
}

export interface CreateLoggerOptions {
  level?: LoggerLevel | string;
  pretty?: boolean;
  context?: Record<string, unknown>;
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? config.logging.level;
  const pretty = options?.pretty ?? config.logging.pretty;

  const pinoOptions: LoggerOptions = {
    level,
    base: {
      component: 'slack-sink',
      ...(options?.context ?? {}),
    },
  };

  if (pretty) {
    return new PinoLogger(
      pino({
        ...pinoOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss.l',
            ignore: 'pid,hostname',
            destination: DIAGNOSTICS_FD,
          },
        },
      })
    );
  }

  return new PinoLogger(pino(pinoOptions, destination(DIAGNOSTICS_FD)));
}

export const logger = createLogger();
