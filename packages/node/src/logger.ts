import { appendFile } from 'node:fs/promises';
import { format } from 'node:util';
import type { LogLevelName } from '@vaultgov/core';

export type LogLevel = LogLevelName;

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LoggerOptions {
  level?: LogLevel;
  file?: string;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  /** Resolves once every line queued for the log file has been written. */
  flush(): Promise<void>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const minValue = LEVEL_ORDER[options.level ?? 'info'];
  const filePath = options.file;
  // file appends are chained: lines land in logging order
  let pending: Promise<void> = Promise.resolve();

  const log = (level: LogLevel, ...args: unknown[]): void => {
    if (LEVEL_ORDER[level] < minValue) {
      return;
    }
    const timestamp = new Date().toISOString();
    const message = format(...args);
    const line = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
    if (level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
    if (filePath) {
      pending = pending
        .then(() => appendFile(filePath, `${line}\n`, 'utf8'))
        .catch((error: unknown) => {
          console.error(`[logger] failed to write ${filePath}:`, error);
        });
    }
  };

  return {
    debug: (...args: unknown[]) => log('debug', ...args),
    info: (...args: unknown[]) => log('info', ...args),
    warn: (...args: unknown[]) => log('warn', ...args),
    error: (...args: unknown[]) => log('error', ...args),
    flush: () => pending,
  };
}
