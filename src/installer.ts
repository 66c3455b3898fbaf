import fs from 'fs';
import pathe from 'pathe';
import type { CommandRunner } from './command';
import type { UpdaterConfig } from './config';
import { describeError, err, ok, type Result } from './errors';
import type { Logger } from './logger';
import { ROOT_OWNER, type PrivilegedFs } from './privileged';

/**
 * setuid, rwxr-xr-x
 */
export const SANDBOX_MODE = 0o4755;

export type InstallConfig = Pick<
  UpdaterConfig,
  'installDir' | 'extractedDirName' | 'sandboxPath'
>;

export interface InstallReport {
  installDir: string;

  /**
   * Whether the sandbox helper was found and given its permissions
   */
  sandboxConfigured: boolean;

  /**
   * Whether an older install was removed to make room
   */
  replacedExisting: boolean;
}

function isDirectory(dirPath: string): boolean {
  return fs.statSync(dirPath, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

/**
 * Runs the bundle's self-extraction inside extractDir
 * @returns The extracted payload directory
 */
export async function extractBundle(
  artifactPath: string,
  extractDir: string,
  extractedDirName: string,
  runner: CommandRunner,
  logger: Logger,
): Promise<Result<string, 'ExtractionError'>> {
  logger.info('Extracting AppImage...');

  try {
    await runner.run(artifactPath, ['--appimage-extract'], { cwd: extractDir });
  } catch (error) {
    return err(
      'ExtractionError',
      `Extraction failed: ${describeError(error)}`,
      error,
    );
  }

  const payloadDir = pathe.join(extractDir, extractedDirName);
  if (!isDirectory(payloadDir)) {
    return err(
      'ExtractionError',
      `Extraction failed - ${extractedDirName} not found`,
    );
  }

  logger.debug(`Extracted payload to ${payloadDir}`);
  return ok(payloadDir);
}

/**
 * Gives the sandbox helper root ownership and the setuid bit, if the
 * payload ships one
 * @returns Whether the helper was present
 */
export async function configureSandbox(
  payloadDir: string,
  sandboxPath: string,
  privileged: PrivilegedFs,
  logger: Logger,
): Promise<Result<boolean, 'InstallError'>> {
  const sandbox = pathe.join(payloadDir, sandboxPath);

  if (!fs.existsSync(sandbox)) {
    logger.warn(`${pathe.basename(sandbox)} not found; may need --no-sandbox`);
    return ok(false);
  }

  try {
    logger.info(`Setting ${pathe.basename(sandbox)} permissions`);
    await privileged.chownChmod(sandbox, ROOT_OWNER, SANDBOX_MODE);
    return ok(true);
  } catch (error) {
    return err(
      'InstallError',
      `Could not set sandbox permissions: ${describeError(error)}`,
      error,
    );
  }
}

/**
 * Sibling path the previous install is parked at during the swap
 */
export function retiredInstallPath(installDir: string, now = Date.now()): string {
  return `${installDir}.old-${now}`;
}

/**
 * Swaps the payload into the install directory. The old install is first
 * renamed aside, so the directory is never left half-deleted; if the new
 * payload cannot be moved in, the old one is put back. Only when that
 * restore also fails is no install directory left.
 * @returns Whether an existing install was replaced
 */
export async function replaceInstallDir(
  payloadDir: string,
  installDir: string,
  privileged: PrivilegedFs,
  logger: Logger,
): Promise<Result<boolean, 'InstallError'>> {
  const replacedExisting = fs.existsSync(installDir);
  const retiredDir = retiredInstallPath(installDir);

  if (replacedExisting) {
    try {
      logger.debug(`Moving old installation aside to ${retiredDir}`);
      await privileged.moveTree(installDir, retiredDir);
    } catch (error) {
      return err(
        'InstallError',
        `Could not move old installation aside: ${describeError(error)}`,
        error,
      );
    }
  }

  try {
    logger.info(`Installing to ${installDir}`);
    await privileged.ensureDir(pathe.dirname(installDir));
    await privileged.moveTree(payloadDir, installDir);
  } catch (error) {
    if (replacedExisting) {
      await restoreRetiredInstall(retiredDir, installDir, privileged, logger);
    }
    return err(
      'InstallError',
      `Could not move new installation into ${installDir}: ${describeError(error)}`,
      error,
    );
  }

  if (replacedExisting) {
    try {
      await privileged.removeTree(retiredDir);
    } catch (error) {
      logger.warn(`Could not remove old installation at ${retiredDir}:`, error);
    }
  }

  return ok(replacedExisting);
}

async function restoreRetiredInstall(
  retiredDir: string,
  installDir: string,
  privileged: PrivilegedFs,
  logger: Logger,
): Promise<void> {
  try {
    await privileged.moveTree(retiredDir, installDir);
    logger.info(`Restored previous installation to ${installDir}`);
  } catch (error) {
    logger.error(
      `Could not restore previous installation from ${retiredDir}:`,
      error,
    );
  }
}

/**
 * Extracts the artifact and swaps it into the install directory
 * @param artifactPath Executable bundle
 * @param extractDir Empty directory owned by this run
 */
export async function installBundle(
  artifactPath: string,
  extractDir: string,
  config: InstallConfig,
  privileged: PrivilegedFs,
  runner: CommandRunner,
  logger: Logger,
): Promise<Result<InstallReport, 'ExtractionError' | 'InstallError'>> {
  const extracted = await extractBundle(
    artifactPath,
    extractDir,
    config.extractedDirName,
    runner,
    logger,
  );
  if (!extracted.ok) {
    return extracted;
  }

  const sandbox = await configureSandbox(
    extracted.value,
    config.sandboxPath,
    privileged,
    logger,
  );
  if (!sandbox.ok) {
    return sandbox;
  }

  const replaced = await replaceInstallDir(
    extracted.value,
    config.installDir,
    privileged,
    logger,
  );
  if (!replaced.ok) {
    return replaced;
  }

  return ok({
    installDir: config.installDir,
    sandboxConfigured: sandbox.value,
    replacedExisting: replaced.value,
  });
}
