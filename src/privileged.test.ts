import fs from 'fs';
import pathe from 'pathe';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { createSilentLogger } from './logger';
import { LocalFs, ROOT_OWNER, SudoFs, verifyPrivileges } from './privileged';
import { failCommand, FakeRunner, makeTempDir, writeFile } from './testing';

describe('SudoFs', () => {
  test('runs every mutation through sudo', async () => {
    const runner = new FakeRunner();
    const privileged = new SudoFs(runner);

    await privileged.verify();
    await privileged.ensureDir('/opt/cursor_backups');
    await privileged.copyTree('/opt/cursor', '/opt/cursor_backups/cursor_20240102_030405');
    await privileged.removeTree('/opt/cursor.old-1');
    await privileged.moveTree('/tmp/extract/squashfs-root', '/opt/cursor');
    await privileged.chownChmod('/opt/cursor/chrome-sandbox', ROOT_OWNER, 0o4755);
    await privileged.createSymlink('/opt/cursor/AppRun', '/usr/local/bin/cursor');

    expect(runner.commandLines()).toEqual([
      'sudo -v',
      'sudo mkdir -p /opt/cursor_backups',
      'sudo cp -a /opt/cursor /opt/cursor_backups/cursor_20240102_030405',
      'sudo rm -rf /opt/cursor.old-1',
      'sudo mv -T /tmp/extract/squashfs-root /opt/cursor',
      'sudo chown root:root /opt/cursor/chrome-sandbox',
      'sudo chmod 4755 /opt/cursor/chrome-sandbox',
      'sudo rm -f /usr/local/bin/cursor',
      'sudo ln -s /opt/cursor/AppRun /usr/local/bin/cursor',
    ]);
  });

  test('reports a refused sudo as a PrivilegeError', async () => {
    const runner = new FakeRunner((call) => failCommand(call, 'sudo: a password is required'));

    const result = await verifyPrivileges(new SudoFs(runner), createSilentLogger());

    expect(!result.ok && result.error).toMatchObject({
      kind: 'PrivilegeError',
      message:
        'Elevated privileges are required: Command failed (exit 1): sudo -v: sudo: a password is required',
    });
  });
});

describe('LocalFs', () => {
  let root: string;
  let source: string;

  beforeEach(() => {
    root = makeTempDir();
    source = pathe.join(root, 'source');
    writeFile(pathe.join(source, 'cursor.png'), 'icon');
    fs.symlinkSync('cursor.png', pathe.join(source, '.DirIcon'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  test('copies relative symlinks as they are', async () => {
    const destination = pathe.join(root, 'copy');

    await new LocalFs().copyTree(source, destination);

    expect(fs.readlinkSync(pathe.join(destination, '.DirIcon'))).toBe('cursor.png');
    fs.rmSync(source, { recursive: true });
    expect(fs.readFileSync(pathe.join(destination, '.DirIcon'), 'utf-8')).toBe('icon');
  });

  test('keeps relative symlinks when moving across filesystems', async () => {
    const destination = pathe.join(root, 'moved');
    const crossDevice = Object.assign(new Error('EXDEV: cross-device link not permitted'), {
      code: 'EXDEV',
    });
    vi.spyOn(fs.promises, 'rename').mockRejectedValueOnce(crossDevice);

    await new LocalFs().moveTree(source, destination);

    expect(fs.existsSync(source)).toBe(false);
    expect(fs.readlinkSync(pathe.join(destination, '.DirIcon'))).toBe('cursor.png');
    expect(fs.existsSync(pathe.join(destination, '.DirIcon'))).toBe(true);
  });

  test('rethrows rename errors other than EXDEV', async () => {
    const denied = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
    vi.spyOn(fs.promises, 'rename').mockRejectedValueOnce(denied);

    await expect(new LocalFs().moveTree(source, pathe.join(root, 'moved'))).rejects.toBe(denied);
    expect(fs.existsSync(pathe.join(root, 'moved'))).toBe(false);
  });

  test('replaces a dangling symlink', async () => {
    const link = pathe.join(root, 'bin/cursor');
    fs.mkdirSync(pathe.dirname(link));
    fs.symlinkSync(pathe.join(root, 'gone'), link);

    await new LocalFs().createSymlink(pathe.join(source, 'cursor.png'), link);

    expect(fs.readFileSync(link, 'utf-8')).toBe('icon');
  });
});
