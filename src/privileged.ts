import fs from 'fs';
import type { CommandRunner } from './command';
import { describeError, err, ok, type Result } from './errors';
import type { Logger } from './logger';

export interface FileOwner {
  user: string;
  group: string;
  uid: number;
  gid: number;
}

export const ROOT_OWNER: FileOwner = {
  user: 'root',
  group: 'root',
  uid: 0,
  gid: 0,
};

/**
 * Filesystem mutations that need elevated privileges. Every method rejects
 * on failure and leaves retrying to the caller.
 */
export interface PrivilegedFs {
  /**
   * Confirms that privileged operations are currently possible
   */
  verify(): Promise<void>;

  ensureDir(dirPath: string): Promise<void>;

  /**
   * Recursively copies a directory, preserving modes. Symlinks are copied
   * as they are, relative targets included.
   */
  copyTree(source: string, destination: string): Promise<void>;

  removeTree(targetPath: string): Promise<void>;

  /**
   * Moves a directory to a path that must not exist yet. Within one
   * filesystem this is a single rename.
   */
  moveTree(source: string, destination: string): Promise<void>;

  chownChmod(targetPath: string, owner: FileOwner, mode: number): Promise<void>;

  /**
   * Replaces whatever is at linkPath, broken links included, with a symlink
   */
  createSymlink(target: string, linkPath: string): Promise<void>;
}

/**
 * Delegates each mutation to sudo
 */
export class SudoFs implements PrivilegedFs {
  constructor(private readonly runner: CommandRunner) {}

  async verify(): Promise<void> {
    await this.runner.run('sudo', ['-v']);
  }

  async ensureDir(dirPath: string): Promise<void> {
    await this.sudo('mkdir', '-p', dirPath);
  }

  async copyTree(source: string, destination: string): Promise<void> {
    await this.sudo('cp', '-a', source, destination);
  }

  async removeTree(targetPath: string): Promise<void> {
    await this.sudo('rm', '-rf', targetPath);
  }

  async moveTree(source: string, destination: string): Promise<void> {
    await this.sudo('mv', '-T', source, destination);
  }

  async chownChmod(
    targetPath: string,
    owner: FileOwner,
    mode: number,
  ): Promise<void> {
    await this.sudo('chown', `${owner.user}:${owner.group}`, targetPath);
    await this.sudo('chmod', mode.toString(8), targetPath);
  }

  async createSymlink(target: string, linkPath: string): Promise<void> {
    await this.sudo('rm', '-f', linkPath);
    await this.sudo('ln', '-s', target, linkPath);
  }

  private async sudo(...args: string[]): Promise<void> {
    await this.runner.run('sudo', args);
  }
}

/**
 * Performs the same mutations in-process, for a process that already runs
 * with enough rights (root, or a tree it owns)
 */
export class LocalFs implements PrivilegedFs {
  async verify(): Promise<void> {}

  async ensureDir(dirPath: string): Promise<void> {
    await fs.promises.mkdir(dirPath, { recursive: true });
  }

  async copyTree(source: string, destination: string): Promise<void> {
    await fs.promises.cp(source, destination, {
      recursive: true,
      errorOnExist: true,
      force: false,
      preserveTimestamps: true,
      verbatimSymlinks: true,
    });
  }

  async removeTree(targetPath: string): Promise<void> {
    await fs.promises.rm(targetPath, { recursive: true, force: true });
  }

  async moveTree(source: string, destination: string): Promise<void> {
    try {
      await fs.promises.rename(source, destination);
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EXDEV') {
        throw error;
      }
      // Different filesystems: copy, then drop the source
      await this.copyTree(source, destination);
      await this.removeTree(source);
    }
  }

  async chownChmod(
    targetPath: string,
    owner: FileOwner,
    mode: number,
  ): Promise<void> {
    await fs.promises.chown(targetPath, owner.uid, owner.gid);
    await fs.promises.chmod(targetPath, mode);
  }

  async createSymlink(target: string, linkPath: string): Promise<void> {
    await fs.promises.rm(linkPath, { force: true });
    await fs.promises.symlink(target, linkPath);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Step wrapper around `verify`
 */
export async function verifyPrivileges(
  privileged: PrivilegedFs,
  logger: Logger,
): Promise<Result<void, 'PrivilegeError'>> {
  try {
    await privileged.verify();
    logger.debug('Privileged operations available');
    return ok(undefined);
  } catch (error) {
    return err(
      'PrivilegeError',
      `Elevated privileges are required: ${describeError(error)}`,
      error,
    );
  }
}
