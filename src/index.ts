import { createCommandRunner, type CommandRunner } from './command';
import { DEFAULT_CONFIG, resolveConfig, type UpdaterConfig } from './config';
import type { ProgressListener } from './download';
import { createLogger, type Logger } from './logger';
import { LocalFs, SudoFs, type PrivilegedFs } from './privileged';
import { confirmOnTerminal } from './prompt';
import { Updater, type ConfirmFn, type UpdateOutcome } from './updater';

export { backupInstall, formatBackupTimestamp } from './backup';
export type { BackupOptions } from './backup';
export { checkDependencies, createCommandRunner } from './command';
export type { CommandOptions, CommandOutput, CommandRunner } from './command';
export { configFromEnv, DEFAULT_CONFIG, resolveConfig } from './config';
export type { UpdaterConfig } from './config';
export { downloadArtifact, parseContentLength } from './download';
export type {
  DownloadedArtifact,
  DownloadOptions,
  DownloadProgress,
  ProgressListener,
} from './download';
export { CommandError, describeError, err, isFatalKind, ok } from './errors';
export type { Err, Ok, Result, UpdateError, UpdateErrorKind } from './errors';
export {
  configureSandbox,
  extractBundle,
  installBundle,
  replaceInstallDir,
  SANDBOX_MODE,
} from './installer';
export type { InstallReport } from './installer';
export { updateLaunchLink } from './link';
export { createLogger } from './logger';
export type { Logger, LogLevel } from './logger';
export { LocalFs, ROOT_OWNER, SudoFs, verifyPrivileges } from './privileged';
export type { FileOwner, PrivilegedFs } from './privileged';
export { createProgressPrinter, formatProgress } from './progress';
export type { ProgressStream } from './progress';
export { buildReleaseUrl, fetchLatestRelease } from './release';
export type { RemoteRelease } from './release';
export { buildCheckReport, formatCheckReport } from './report';
export type { CheckReport } from './report';
export { cleanupTemporaryFiles, createTempPaths } from './temp';
export type { UpdatePaths } from './temp';
export { Updater } from './updater';
export type {
  ConfirmFn,
  InstallFileOptions,
  RunOptions,
  UpdateOutcome,
  UpdatePhase,
  UpdaterOptions,
} from './updater';
export {
  extractVersion,
  isUpdateNeeded,
  readInstalledVersion,
  UNKNOWN_VERSION,
} from './version';
export type { UpdateDecision, UpdateReason } from './version';

/**
 * Options for the checkAndUpdate function
 */
export interface CheckAndUpdateOptions {
  /**
   * Whether to enable verbose debug logging
   */
  debug: boolean;

  /**
   * Install even when already up to date
   * @default false
   */
  force?: boolean;

  /**
   * Skip copying the current installation before replacing it
   * @default false
   */
  skipBackup?: boolean;

  /**
   * Only report whether an update is available
   * @default false
   */
  checkOnly?: boolean;

  /**
   * Overrides for the default paths, endpoint and timeouts
   */
  config?: Partial<UpdaterConfig>;

  /**
   * Asked whether to go on when the backup fails
   * @default a terminal prompt, declined without a terminal
   */
  confirm?: ConfirmFn;

  onProgress?: ProgressListener;

  signal?: AbortSignal;

  /**
   * @default console plus the configured log file
   */
  logger?: Logger;

  /**
   * @default LocalFs when running as root, SudoFs otherwise
   */
  privileged?: PrivilegedFs;

  runner?: CommandRunner;
}

function isRoot(): boolean {
  return typeof process.getuid === 'function' && process.getuid() === 0;
}

function sameCommands(left: string[], right: readonly string[]): boolean {
  return (
    left.length === right.length &&
    left.every((command, index) => command === right[index])
  );
}

/**
 * Builds the Updater for a set of options and logs what it will run with
 */
function createUpdater(opts: CheckAndUpdateOptions): Updater {
  const config = resolveConfig(opts.config);
  const logger =
    opts.logger ?? createLogger({ debug: opts.debug, logFile: config.logFile });
  const runner = opts.runner ?? createCommandRunner(logger);

  let privileged = opts.privileged;
  if (!privileged) {
    if (isRoot()) {
      privileged = new LocalFs();
      // Root needs no sudo unless the caller asked for it explicitly
      if (sameCommands(config.requiredCommands, DEFAULT_CONFIG.requiredCommands)) {
        config.requiredCommands = config.requiredCommands.filter(
          (command) => command !== 'sudo',
        );
      }
    } else {
      privileged = new SudoFs(runner);
    }
  }

  logger.debug('Starting update check with options:', {
    force: opts.force ?? false,
    skipBackup: opts.skipBackup ?? false,
    checkOnly: opts.checkOnly ?? false,
    privileged: privileged.constructor.name,
    config,
  });

  return new Updater({
    config,
    logger,
    privileged,
    runner,
    confirm: opts.confirm ?? confirmOnTerminal,
    onProgress: opts.onProgress,
  });
}

/**
 * Checks for a newer release and installs it
 *
 * @param opts Options for the update run
 * @returns How the run ended; failures are reported here, not thrown
 */
export async function checkAndUpdate(
  opts: CheckAndUpdateOptions,
): Promise<UpdateOutcome> {
  return createUpdater(opts).run({
    force: opts.force,
    skipBackup: opts.skipBackup,
    checkOnly: opts.checkOnly,
    signal: opts.signal,
  });
}

/**
 * Installs an AppImage that is already on disk, skipping the release lookup
 * and the download
 *
 * @param artifactPath Path to the AppImage
 * @param opts Options for the run; force and checkOnly do not apply
 */
export async function installFromFile(
  artifactPath: string,
  opts: CheckAndUpdateOptions,
): Promise<UpdateOutcome> {
  return createUpdater(opts).installFile(artifactPath, {
    skipBackup: opts.skipBackup,
    signal: opts.signal,
  });
}
