import fs from 'fs';
import pathe from 'pathe';
import type { Logger } from './logger';
import type { PrivilegedFs } from './privileged';

/**
 * Temporary resources owned by a single run
 */
export interface UpdatePaths {
  /**
   * Path the downloaded bundle is written to
   */
  artifactPath: string;

  /**
   * Directory the bundle extracts itself into
   */
  extractDir: string;
}

/**
 * Creates unique temporary paths for download and extraction. The
 * extraction directory is created; the artifact path is not.
 * @param tempDir Parent directory for both
 * @param appName Prefix for the names
 */
export function createTempPaths(tempDir: string, appName: string): UpdatePaths {
  const sanitizedName = appName.replace(/[^a-zA-Z0-9]/g, '_');
  const extractDir = fs.mkdtempSync(
    pathe.join(tempDir, `${sanitizedName}_extract_`),
  );
  const random = Math.random().toString(36).slice(2, 10);
  const artifactPath = pathe.join(
    tempDir,
    `${sanitizedName}-${Date.now()}-${random}.AppImage`,
  );

  return { artifactPath, extractDir };
}

/**
 * Removes the run's temporary files. Failures are logged, never raised.
 * The extraction directory may hold root-owned files, so it goes through
 * the privileged filesystem.
 */
export async function cleanupTemporaryFiles(
  paths: UpdatePaths,
  privileged: PrivilegedFs,
  logger: Logger,
): Promise<void> {
  logger.info('Cleaning up temporary files');

  try {
    await fs.promises.rm(paths.artifactPath, { force: true });
    logger.debug(`Deleted artifact: ${paths.artifactPath}`);
  } catch (error) {
    logger.warn(`Cleanup failed for ${paths.artifactPath}:`, error);
  }

  if (!fs.existsSync(paths.extractDir)) {
    return;
  }
  try {
    await fs.promises.rm(paths.extractDir, { recursive: true, force: true });
    logger.debug(`Deleted extraction directory: ${paths.extractDir}`);
  } catch (error) {
    logger.debug(`Unprivileged removal of ${paths.extractDir} failed:`, error);
    try {
      await privileged.removeTree(paths.extractDir);
      logger.debug(`Deleted extraction directory: ${paths.extractDir}`);
    } catch (privilegedError) {
      logger.warn(`Cleanup failed for ${paths.extractDir}:`, privilegedError);
    }
  }
}
