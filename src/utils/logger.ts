// src/utils/logger.ts
import { LOG_LEVEL } from '../config/environment';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isKnownLevel(level: string): level is keyof typeof LEVEL_ORDER {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, level);
}

function thresholdFor(level: string): number {
  return isKnownLevel(level) ? LEVEL_ORDER[level] : LEVEL_ORDER.info;
}

function formatMeta(meta: unknown[]): unknown[] {
  return meta.map(value => {
    if (value instanceof Error) {
      return value.stack || `${value.name}: ${value.message}`;
    }
    return value;
  });
}

export function createLogger(level: string = LOG_LEVEL): Logger {
  const threshold = thresholdFor(level);

  const write = (logLevel: LogLevel, message: string, meta: unknown[]): void => {
    if (LEVEL_ORDER[logLevel] < threshold) {
      return;
    }
    const line = `${new Date().toISOString()} ${logLevel.toUpperCase().padEnd(5)} ${message}`;
    const sink = logLevel === 'error' ? console.error : logLevel === 'warn' ? console.warn : console.log;
    sink(line, ...formatMeta(meta));
  };

  return {
    debug: (message, ...meta) => write('debug', message, meta),
    info: (message, ...meta) => write('info', message, meta),
    warn: (message, ...meta) => write('warn', message, meta),
    error: (message, ...meta) => write('error', message, meta)
  };
}

export const logger = createLogger();
