import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLogger, isLogLevel } from '../src/logger.js';

const LINE = /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[([A-Z]+)\] (.*)$/;

describe('createLogger', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'vaultgov-logger-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  it('drops messages below the minimum level', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger({ level: 'warn' });

    logger.debug('quiet');
    logger.info('quiet');
    logger.warn('loud %d', 42);

    expect(out).toHaveBeenCalledTimes(1);
    const match = LINE.exec(String(out.mock.calls[0][0]));
    expect(match?.[1]).toBe('WARN');
    expect(match?.[2]).toBe('loud 42');
  });

  it('defaults to info', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger();

    logger.debug('hidden');
    logger.info('shown');

    expect(out).toHaveBeenCalledTimes(1);
    expect(LINE.exec(String(out.mock.calls[0][0]))?.[2]).toBe('shown');
  });

  it('sends errors to stderr', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger({ level: 'debug' });

    logger.error('broken: %s', 'disk');

    expect(out).not.toHaveBeenCalled();
    expect(LINE.exec(String(err.mock.calls[0][0]))?.slice(1)).toEqual(['ERROR', 'broken: disk']);
  });

  it('appends every line to the log file in order', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const file = join(tempDir, 'vaultgov.log');
    const logger = createLogger({ level: 'debug', file });

    logger.debug('first');
    logger.info('second');
    logger.warn('third');
    await logger.flush();

    const lines = (await readFile(file, 'utf8')).trimEnd().split('\n');
    expect(lines.map((line) => LINE.exec(line)?.slice(1))).toEqual([
      ['DEBUG', 'first'],
      ['INFO', 'second'],
      ['WARN', 'third'],
    ]);
  });

  it('recognises level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
