import pino from 'pino';
import pretty from 'pino-pretty';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

export interface LoggingOptions {
  level: LogLevel;
  pretty?: boolean;
}

function buildRoot(options: LoggingOptions): pino.Logger {
  if (options.pretty) {
    return pino(
      { level: options.level },
      pretty({
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      })
    );
  }
  return pino({ level: options.level });
}

let root = buildRoot({ level: parseLevel(process.env.LOG_LEVEL) });

function parseLevel(value: string | undefined): LogLevel {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return value;
    default:
      return 'info';
  }
}

/**
 * Replaces the process-wide sink. Called once by the CLI before any work starts;
 * loggers handed out earlier by `createLogger` pick up the new sink on their next call.
 */
export function configureLogging(options: LoggingOptions): void {
  root = buildRoot(options);
}

export function createLogger(scope: string): Logger {
  return {
    error: (msg, ctx) => root.error(ctx ?? {}, `[${scope}] ${msg}`),
    warn: (msg, ctx) => root.warn(ctx ?? {}, `[${scope}] ${msg}`),
    info: (msg, ctx) => root.info(ctx ?? {}, `[${scope}] ${msg}`),
    debug: (msg, ctx) => root.debug(ctx ?? {}, `[${scope}] ${msg}`),
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
