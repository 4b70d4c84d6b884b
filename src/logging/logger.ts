import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export interface LoggerFactoryOptions {
  level?: string;
  name?: string;
}

function buildOptions(options: LoggerFactoryOptions = {}): LoggerOptions {
  return {
    level: options.level || process.env.LOG_LEVEL || 'info',
    name: options.name || 'gatehouse',
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
    },
  };
}

let rootLogger: Logger | null = null;

export function getLogger(options?: LoggerFactoryOptions): Logger {
  if (!rootLogger) {
    rootLogger = pino(buildOptions(options));
  }
  return rootLogger;
}

export function createChildLogger(binding: Record<string, unknown>): Logger {
  return getLogger().child(binding);
}

/**
 * Logger that discards everything; handy for tests and embedded use.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
