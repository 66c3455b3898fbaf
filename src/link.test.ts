import fs from 'fs';
import pathe from 'pathe';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { updateLaunchLink } from './link';
import { createSilentLogger } from './logger';
import { LocalFs } from './privileged';
import { failCommand, FakeRunner, makeTempDir } from './testing';

const logger = createSilentLogger();

describe('updateLaunchLink', () => {
  let root: string;
  let config: {
    installDir: string;
    entryPoint: string;
    symlinkPath: string;
    desktopDir: string;
  };

  beforeEach(() => {
    root = makeTempDir();
    config = {
      installDir: pathe.join(root, 'opt/cursor'),
      entryPoint: 'AppRun',
      symlinkPath: pathe.join(root, 'bin/cursor'),
      desktopDir: pathe.join(root, 'applications'),
    };
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  test('replaces a broken symlink with one to the entry point', async () => {
    fs.mkdirSync(pathe.dirname(config.symlinkPath), { recursive: true });
    fs.symlinkSync(pathe.join(root, 'gone/AppRun'), config.symlinkPath);
    const runner = new FakeRunner();

    const result = await updateLaunchLink(config, new LocalFs(), runner, logger);

    expect(result).toEqual({ ok: true, value: undefined });
    expect(fs.readlinkSync(config.symlinkPath)).toBe(pathe.join(root, 'opt/cursor/AppRun'));
    expect(runner.calls).toEqual([]);
  });

  test('refreshes the desktop database when the directory exists', async () => {
    fs.mkdirSync(config.desktopDir);
    const runner = new FakeRunner();

    const result = await updateLaunchLink(config, new LocalFs(), runner, logger);

    expect(result.ok).toBe(true);
    expect(runner.commandLines()).toEqual([`update-desktop-database ${config.desktopDir}`]);
  });

  test('reports a failed refresh as a LinkError and keeps the link', async () => {
    fs.mkdirSync(config.desktopDir);
    const runner = new FakeRunner((call) => failCommand(call, 'database locked'));

    const result = await updateLaunchLink(config, new LocalFs(), runner, logger);

    expect(!result.ok && result.error.kind).toBe('LinkError');
    expect(fs.lstatSync(config.symlinkPath).isSymbolicLink()).toBe(true);
  });
});
