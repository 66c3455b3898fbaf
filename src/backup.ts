import fs from 'fs';
import pathe from 'pathe';
import { describeError, err, ok, type Result } from './errors';
import type { Logger } from './logger';
import type { PrivilegedFs } from './privileged';

export interface BackupOptions {
  /**
   * Install directory to snapshot
   */
  sourceDir: string;

  /**
   * Directory that receives the timestamped copies
   */
  backupRoot: string;

  /**
   * Prefix of the backup directory name
   */
  appName: string;

  /**
   * Clock used for the backup name
   * @default new Date()
   */
  now?: Date;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Formats a local time as YYYYMMDD_HHMMSS
 */
export function formatBackupTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * Picks a backup path that does not exist yet, suffixing _1, _2, ... on
 * a same-second collision
 */
function pickBackupPath(backupRoot: string, baseName: string): string {
  let candidate = pathe.join(backupRoot, baseName);
  for (let suffix = 1; fs.existsSync(candidate); suffix++) {
    candidate = pathe.join(backupRoot, `${baseName}_${suffix}`);
  }
  return candidate;
}

/**
 * Copies the install directory into a new timestamped backup directory.
 * Nothing to copy is a success with a null path.
 */
export async function backupInstall(
  options: BackupOptions,
  privileged: PrivilegedFs,
  logger: Logger,
): Promise<Result<string | null, 'BackupError'>> {
  const { sourceDir, backupRoot, appName } = options;

  if (!fs.existsSync(sourceDir)) {
    logger.info('No existing installation to backup');
    return ok(null);
  }

  try {
    if (!fs.existsSync(backupRoot)) {
      logger.info(`Creating backup directory: ${backupRoot}`);
      await privileged.ensureDir(backupRoot);
    }

    const timestamp = formatBackupTimestamp(options.now ?? new Date());
    const destination = pickBackupPath(backupRoot, `${appName}_${timestamp}`);

    logger.info(`Backing up ${sourceDir} to ${destination}`);
    await privileged.copyTree(sourceDir, destination);
    return ok(destination);
  } catch (error) {
    logger.error('Backup failed:', error);
    return err('BackupError', `Backup failed: ${describeError(error)}`, error);
  }
}
