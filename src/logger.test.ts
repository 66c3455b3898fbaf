import fs from 'fs';
import pathe from 'pathe';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { createLogger } from './logger';
import { makeTempDir, writeFile } from './testing';

describe('createLogger', () => {
  let dir: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleWarnSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    dir = makeTempDir();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleWarnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('prefixes console output with the level', () => {
    const logger = createLogger({ debug: true });

    logger.debug('Phase:', 'download');
    logger.info('Downloaded %d bytes', 42);
    logger.warn('Sandbox missing');
    logger.error('Install failed');

    expect(consoleLogSpy.mock.calls).toEqual([
      ['[cursor-updater:debug]', 'Phase: download'],
      ['[cursor-updater:info]', 'Downloaded 42 bytes'],
    ]);
    expect(consoleWarnSpy.mock.calls).toEqual([
      ['[cursor-updater:warn]', 'Sandbox missing'],
      ['[cursor-updater:error]', 'Install failed'],
    ]);
  });

  test('drops debug output unless enabled', () => {
    const logger = createLogger({ debug: false });

    logger.debug('hidden');

    expect(consoleLogSpy).not.toHaveBeenCalled();
  });

  test('appends timestamped lines to the log file', () => {
    const logFile = pathe.join(dir, 'logs/updater.log');
    const logger = createLogger({ debug: false, logFile });

    logger.info('Installed version: 0.42.0');
    logger.error('Download failed: 404 Not Found');

    const lines = fs.readFileSync(logFile, 'utf-8').split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(
      /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z - INFO - Installed version: 0\.42\.0$/,
    );
    expect(lines[1]).toMatch(/ - ERROR - Download failed: 404 Not Found$/);
    expect(lines[2]).toBe('');
  });

  test('falls back to the console when the log file cannot be written', () => {
    const blocker = pathe.join(dir, 'blocker');
    writeFile(blocker, 'not a directory');
    const logger = createLogger({ debug: false, logFile: pathe.join(blocker, 'updater.log') });

    logger.info('first');
    logger.info('second');

    const fileWarnings = consoleWarnSpy.mock.calls.filter(([, message]) =>
      String(message).startsWith('Cannot write log file'),
    );
    expect(fileWarnings).toHaveLength(1);
    expect(logger.logFile).toBeUndefined();
    expect(consoleLogSpy).toHaveBeenCalledWith('[cursor-updater:info]', 'second');
  });
});
