import fs from 'fs';
import pathe from 'pathe';
import type { CommandRunner } from './command';
import type { UpdaterConfig } from './config';
import { describeError, err, ok, type Result } from './errors';
import type { Logger } from './logger';
import type { PrivilegedFs } from './privileged';

export type LinkConfig = Pick<
  UpdaterConfig,
  'installDir' | 'entryPoint' | 'symlinkPath' | 'desktopDir'
>;

/**
 * Points the launch symlink at the installed entry point and refreshes the
 * desktop database when the user has one. The install stays in place
 * whatever happens here.
 */
export async function updateLaunchLink(
  config: LinkConfig,
  privileged: PrivilegedFs,
  runner: CommandRunner,
  logger: Logger,
): Promise<Result<void, 'LinkError'>> {
  const target = pathe.join(config.installDir, config.entryPoint);

  try {
    logger.info(`Creating symlink at ${config.symlinkPath}`);
    await privileged.ensureDir(pathe.dirname(config.symlinkPath));
    await privileged.createSymlink(target, config.symlinkPath);
  } catch (error) {
    return err(
      'LinkError',
      `Failed to update symlink ${config.symlinkPath}: ${describeError(error)}`,
      error,
    );
  }

  if (fs.existsSync(config.desktopDir)) {
    try {
      logger.info('Updating desktop database');
      await runner.run('update-desktop-database', [config.desktopDir]);
    } catch (error) {
      return err(
        'LinkError',
        `Failed to update desktop database: ${describeError(error)}`,
        error,
      );
    }
  }

  return ok(undefined);
}
