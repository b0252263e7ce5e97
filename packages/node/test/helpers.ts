import { format } from 'node:util';
import type { Logger, LogLevel } from '../src/logger.js';

export const DEPLOYER = '0x1000000000000000000000000000000000000001';
export const ALICE = '0x2000000000000000000000000000000000000002';
export const BOB = '0x3000000000000000000000000000000000000003';
export const RECIPIENT = '0x6000000000000000000000000000000000000006';

export interface CapturedLine {
  level: LogLevel;
  message: string;
}

/** Logger that keeps formatted messages in memory. */
export function captureLogger(): { logger: Logger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  const record =
    (level: LogLevel) =>
    (...args: unknown[]): void => {
      lines.push({ level, message: format(...args) });
    };
  return {
    lines,
    logger: {
      debug: record('debug'),
      info: record('info'),
      warn: record('warn'),
      error: record('error'),
      flush: () => Promise.resolve(),
    },
  };
}
