import fs from 'fs';
import pathe from 'pathe';
import { backupInstall } from './backup';
import { checkDependencies, type CommandRunner } from './command';
import { resolveConfig, type UpdaterConfig } from './config';
import { downloadArtifact, type ProgressListener } from './download';
import { describeError, isFatalKind, ok, type Result, type UpdateError } from './errors';
import { installBundle } from './installer';
import { updateLaunchLink } from './link';
import type { Logger } from './logger';
import { verifyPrivileges, type PrivilegedFs } from './privileged';
import { fetchLatestRelease, type RemoteRelease } from './release';
import { buildCheckReport, type CheckReport } from './report';
import { cleanupTemporaryFiles, createTempPaths, type UpdatePaths } from './temp';
import { extractVersion, isUpdateNeeded, readInstalledVersion } from './version';

export type UpdatePhase =
  | 'start'
  | 'read-installed'
  | 'resolve-remote'
  | 'compare'
  | 'backup'
  | 'download'
  | 'install'
  | 'relink'
  | 'cleanup'
  | 'done'
  | 'up-to-date'
  | 'check-only'
  | 'aborted';

/**
 * Final status of a run
 */
export type UpdateOutcome =
  | { status: 'up-to-date'; installed: string; latest: string }
  | { status: 'check-only'; report: CheckReport }
  | {
      status: 'success';
      previous: string | null;
      version: string;
      backupPath: string | null;
      /**
       * Degraded steps the run carried on past
       */
      warnings: UpdateError[];
    }
  | {
      status: 'aborted';
      phase: UpdatePhase;
      error: UpdateError;
      /**
       * False when the run died between removing the old install and
       * moving the new one in
       */
      installDirPresent: boolean;
      backupPath: string | null;
    };

export interface RunOptions {
  /**
   * Install even when the installed version is current
   */
  force?: boolean;

  skipBackup?: boolean;

  /**
   * Report availability without touching anything
   */
  checkOnly?: boolean;

  /**
   * Interrupts the run between steps and during network transfers
   */
  signal?: AbortSignal;
}

/**
 * Options for installing a bundle that is already on disk
 */
export type InstallFileOptions = Pick<RunOptions, 'skipBackup' | 'signal'>;

/**
 * Asks the user a yes/no question
 */
export type ConfirmFn = (message: string) => Promise<boolean>;

export interface UpdaterOptions {
  /**
   * Overrides applied on top of DEFAULT_CONFIG
   */
  config?: Partial<UpdaterConfig>;
  logger: Logger;
  privileged: PrivilegedFs;
  runner: CommandRunner;
  confirm: ConfirmFn;
  onProgress?: ProgressListener;
  now?: () => Date;
}

const TERMINAL_PHASES: Record<UpdateOutcome['status'], UpdatePhase> = {
  'up-to-date': 'up-to-date',
  'check-only': 'check-only',
  success: 'done',
  aborted: 'aborted',
};

/**
 * Sequences version discovery, backup, download, install and relinking for
 * one application bundle. Assumes no other instance runs against the same
 * install directory.
 */
export class Updater {
  readonly config: UpdaterConfig;
  private readonly logger: Logger;
  private readonly privileged: PrivilegedFs;
  private readonly runner: CommandRunner;
  private readonly confirm: ConfirmFn;
  private readonly onProgress?: ProgressListener;
  private readonly now: () => Date;
  private phases: UpdatePhase[] = [];

  constructor(options: UpdaterOptions) {
    this.config = resolveConfig(options.config);
    this.logger = options.logger;
    this.privileged = options.privileged;
    this.runner = options.runner;
    this.confirm = options.confirm;
    this.onProgress = options.onProgress;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Phases visited by the latest run, in order
   */
  get history(): readonly UpdatePhase[] {
    return [...this.phases];
  }

  async run(options: RunOptions = {}): Promise<UpdateOutcome> {
    this.phases = [];
    this.logger.debug('Starting update run with options:', {
      force: options.force ?? false,
      skipBackup: options.skipBackup ?? false,
      checkOnly: options.checkOnly ?? false,
    });

    const outcome = await this.execute(options);
    this.enter(TERMINAL_PHASES[outcome.status]);
    return outcome;
  }

  /**
   * Installs a bundle from a local file instead of downloading one. The
   * file is made executable in place; it is never deleted.
   */
  async installFile(
    artifactPath: string,
    options: InstallFileOptions = {},
  ): Promise<UpdateOutcome> {
    this.phases = [];
    this.logger.debug(`Installing from local file ${artifactPath}`);

    const outcome = await this.executeInstallFile(artifactPath, options);
    this.enter(TERMINAL_PHASES[outcome.status]);
    return outcome;
  }

  private async execute(options: RunOptions): Promise<UpdateOutcome> {
    const { config, logger } = this;
    const { signal } = options;

    this.enter('start');
    if (!options.checkOnly) {
      const ready = await this.checkPrerequisites();
      if (!ready.ok) {
        return this.abort(ready.error);
      }
    }

    this.enter('read-installed');
    const installed = readInstalledVersion(
      config.metadataFile,
      config.versionKey,
      logger,
    );
    logger.info(`Installed version: ${installed ?? 'none'}`);

    this.enter('resolve-remote');
    const resolved = await fetchLatestRelease(config, logger, signal);
    if (!resolved.ok) {
      return this.abort(resolved.error);
    }
    const release = resolved.value;
    logger.info(`Latest available version: ${release.version}`);

    this.enter('compare');
    const decision = isUpdateNeeded(
      { installed, latest: release.version, force: options.force },
      logger,
    );
    const warnings: UpdateError[] = [];
    if (decision.parseError) {
      const stop = this.degrade(decision.parseError, warnings);
      if (stop) {
        return stop;
      }
    }

    if (!decision.updateNeeded && installed !== null) {
      logger.info('✓ Already up to date.');
      return { status: 'up-to-date', installed, latest: release.version };
    }

    if (options.checkOnly) {
      return {
        status: 'check-only',
        report: buildCheckReport(installed, release.version),
      };
    }

    return this.applyUpdate(installed, release, warnings, options);
  }

  /**
   * Backup, download, install and relink. Temporary files are released on
   * every path out.
   */
  private async applyUpdate(
    installed: string | null,
    release: RemoteRelease,
    warnings: UpdateError[],
    options: RunOptions,
  ): Promise<UpdateOutcome> {
    const { config, logger } = this;
    const { signal } = options;

    this.enter('backup');
    const backup = await this.takeBackup(options, warnings);
    if (!backup.ok) {
      return this.abort(backup.error);
    }
    const backupPath = backup.value;

    if (signal?.aborted) {
      return this.interrupted(backupPath);
    }

    const paths = createTempPaths(config.tempDir, config.appName);
    logger.debug('Created temporary paths:', paths);

    let outcome: UpdateOutcome;
    try {
      outcome = await this.installRelease(
        installed,
        release,
        paths,
        backupPath,
        warnings,
        signal,
      );
    } finally {
      this.enter('cleanup');
      await cleanupTemporaryFiles(paths, this.privileged, logger);
    }
    return outcome;
  }

  private async installRelease(
    installed: string | null,
    release: RemoteRelease,
    paths: UpdatePaths,
    backupPath: string | null,
    warnings: UpdateError[],
    signal: AbortSignal | undefined,
  ): Promise<UpdateOutcome> {
    const { config, logger } = this;

    this.enter('download');
    const downloaded = await downloadArtifact(
      release.downloadUrl,
      paths.artifactPath,
      {
        timeoutMs: config.downloadTimeoutMs,
        userAgent: config.userAgent,
        signal,
        onProgress: this.onProgress,
      },
      logger,
    );
    if (!downloaded.ok) {
      return this.abort(downloaded.error, backupPath);
    }

    return this.installAndLink(
      downloaded.value.path,
      paths.extractDir,
      installed,
      release.version,
      backupPath,
      warnings,
      signal,
    );
  }

  private async executeInstallFile(
    artifactPath: string,
    options: InstallFileOptions,
  ): Promise<UpdateOutcome> {
    const { config, logger } = this;
    const { signal } = options;

    this.enter('start');
    const stat = fs.statSync(artifactPath, { throwIfNoEntry: false });
    if (!stat?.isFile()) {
      return this.abort({
        kind: 'InstallError',
        message: `File '${artifactPath}' not found`,
      });
    }
    const ready = await this.checkPrerequisites();
    if (!ready.ok) {
      return this.abort(ready.error);
    }

    this.enter('read-installed');
    const installed = readInstalledVersion(
      config.metadataFile,
      config.versionKey,
      logger,
    );
    logger.info(`Installed version: ${installed ?? 'none'}`);

    try {
      await fs.promises.chmod(artifactPath, stat.mode | 0o111);
    } catch (error) {
      return this.abort({
        kind: 'InstallError',
        message: `Could not make ${artifactPath} executable: ${describeError(error)}`,
        cause: error,
      });
    }

    const warnings: UpdateError[] = [];
    this.enter('backup');
    const backup = await this.takeBackup(options, warnings);
    if (!backup.ok) {
      return this.abort(backup.error);
    }
    const backupPath = backup.value;

    if (signal?.aborted) {
      return this.interrupted(backupPath);
    }

    const paths = createTempPaths(config.tempDir, config.appName);
    let outcome: UpdateOutcome;
    try {
      outcome = await this.installAndLink(
        artifactPath,
        paths.extractDir,
        installed,
        extractVersion(pathe.basename(artifactPath)),
        backupPath,
        warnings,
        signal,
      );
    } finally {
      this.enter('cleanup');
      await cleanupTemporaryFiles(paths, this.privileged, logger);
    }
    return outcome;
  }

  /**
   * Dependency check and privilege verification ahead of any mutation
   */
  private async checkPrerequisites(): Promise<
    Result<void, 'DependencyError' | 'PrivilegeError'>
  > {
    const dependencies = await checkDependencies(
      this.config.requiredCommands,
      this.runner,
      this.logger,
    );
    if (!dependencies.ok) {
      return dependencies;
    }
    return verifyPrivileges(this.privileged, this.logger);
  }

  /**
   * Copies the install directory aside. A failed copy asks whether to go
   * on without one; declining fails the step.
   * @returns The backup directory, or null when none was taken
   */
  private async takeBackup(
    options: Pick<RunOptions, 'skipBackup'>,
    warnings: UpdateError[],
  ): Promise<Result<string | null, 'BackupError'>> {
    const { config, logger } = this;

    if (options.skipBackup) {
      logger.info('Skipping backup of existing installation');
      return ok(null);
    }
    if (!fs.existsSync(config.installDir)) {
      return ok(null);
    }

    const backup = await backupInstall(
      {
        sourceDir: config.installDir,
        backupRoot: config.backupDir,
        appName: config.appName,
        now: this.now(),
      },
      this.privileged,
      logger,
    );
    if (backup.ok) {
      return backup;
    }

    const proceed = await this.confirm('Backup failed. Continue anyway?');
    if (!proceed) {
      logger.info('Update aborted after failed backup');
      return backup;
    }
    logger.warn('Continuing without a backup');
    warnings.push(backup.error);
    return ok(null);
  }

  private async installAndLink(
    artifactPath: string,
    extractDir: string,
    installed: string | null,
    expectedVersion: string,
    backupPath: string | null,
    warnings: UpdateError[],
    signal: AbortSignal | undefined,
  ): Promise<UpdateOutcome> {
    const { config, logger } = this;

    this.enter('install');
    if (signal?.aborted) {
      return this.interrupted(backupPath);
    }
    const privileges = await verifyPrivileges(this.privileged, logger);
    if (!privileges.ok) {
      return this.abort(privileges.error, backupPath);
    }

    const installedBundle = await installBundle(
      artifactPath,
      extractDir,
      config,
      this.privileged,
      this.runner,
      logger,
    );
    if (!installedBundle.ok) {
      return this.abort(installedBundle.error, backupPath);
    }

    this.enter('relink');
    const linked = await updateLaunchLink(
      config,
      this.privileged,
      this.runner,
      logger,
    );
    if (!linked.ok) {
      logger.warn(`Failed to update symlinks or desktop database: ${linked.error.message}`);
      const stop = this.degrade(linked.error, warnings, backupPath);
      if (stop) {
        return stop;
      }
    }

    const version =
      readInstalledVersion(config.metadataFile, config.versionKey, logger) ??
      expectedVersion;
    logger.info(`✓ Successfully upgraded to ${version}`);

    return {
      status: 'success',
      previous: installed,
      version,
      backupPath,
      warnings,
    };
  }

  /**
   * Records a recoverable error as a warning and lets the run go on; any
   * other kind ends it
   * @returns The aborted outcome, or null to continue
   */
  private degrade(
    error: UpdateError,
    warnings: UpdateError[],
    backupPath: string | null = null,
  ): UpdateOutcome | null {
    if (isFatalKind(error.kind)) {
      return this.abort(error, backupPath);
    }
    this.logger.debug(`Continuing after ${error.kind}`);
    warnings.push(error);
    return null;
  }

  private enter(phase: UpdatePhase): void {
    this.phases.push(phase);
    this.logger.debug(`Phase: ${phase}`);
  }

  private get currentPhase(): UpdatePhase {
    return this.phases[this.phases.length - 1] ?? 'start';
  }

  private abort(
    error: UpdateError,
    backupPath: string | null = null,
  ): UpdateOutcome {
    this.logger.error(`${error.kind}: ${error.message}`);
    if (error.cause !== undefined) {
      this.logger.debug('Cause:', error.cause);
    }
    return {
      status: 'aborted',
      phase: this.currentPhase,
      error,
      installDirPresent: fs.existsSync(this.config.installDir),
      backupPath,
    };
  }

  private interrupted(backupPath: string | null): UpdateOutcome {
    return this.abort(
      { kind: 'Interrupted', message: 'Update cancelled by user' },
      backupPath,
    );
  }
}
