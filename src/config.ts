import os from 'os';
import pathe from 'pathe';

/**
 * Configuration for a single managed application bundle
 */
export interface UpdaterConfig {
  /**
   * Short application name, used for backup and temporary file names
   * @default "cursor"
   */
  appName: string;

  /**
   * Name shown to the user in reports
   * @default "Cursor"
   */
  displayName: string;

  /**
   * Remote endpoint that reports the latest release's download location
   */
  apiEndpoint: string;

  /**
   * Platform identifier sent to the endpoint
   * @default "linux-x64"
   */
  platform: string;

  /**
   * @default "latest"
   */
  releaseTrack: string;

  userAgent: string;

  /**
   * Canonical location of the active bundle payload
   * @default "/opt/cursor"
   */
  installDir: string;

  /**
   * Directory holding timestamped copies of past installs
   * @default "/opt/cursor_backups"
   */
  backupDir: string;

  /**
   * Installed metadata file with line-oriented KEY=VALUE entries
   */
  metadataFile: string;

  /**
   * Key in the metadata file holding the installed version
   * @default "X-AppImage-Version"
   */
  versionKey: string;

  /**
   * Public launch path, a symlink to the entry point
   * @default "/usr/local/bin/cursor"
   */
  symlinkPath: string;

  /**
   * Entry point relative to the install directory
   * @default "AppRun"
   */
  entryPoint: string;

  /**
   * Directory the bundle's self-extraction produces
   * @default "squashfs-root"
   */
  extractedDirName: string;

  /**
   * Setuid sandbox helper, relative to the extracted payload
   */
  sandboxPath: string;

  /**
   * Per-user desktop integration directory
   */
  desktopDir: string;

  /**
   * Durable log file
   */
  logFile: string;

  /**
   * Where the downloaded bundle and extraction directory are created
   */
  tempDir: string;

  /**
   * Timeout for the release metadata request in milliseconds
   * @default 15000
   */
  requestTimeoutMs: number;

  /**
   * Timeout for the whole artifact download in milliseconds
   * @default 1800000 (30 minutes)
   */
  downloadTimeoutMs: number;

  /**
   * System commands that must be available before a mutating run
   */
  requiredCommands: string[];
}

export const DEFAULT_CONFIG: Readonly<UpdaterConfig> = Object.freeze({
  appName: 'cursor',
  displayName: 'Cursor',
  apiEndpoint: 'https://www.cursor.com/api/download',
  platform: 'linux-x64',
  releaseTrack: 'latest',
  userAgent: 'Cursor-Version-Checker',
  installDir: '/opt/cursor',
  backupDir: '/opt/cursor_backups',
  metadataFile: '/opt/cursor/cursor.desktop',
  versionKey: 'X-AppImage-Version',
  symlinkPath: '/usr/local/bin/cursor',
  entryPoint: 'AppRun',
  extractedDirName: 'squashfs-root',
  sandboxPath: 'usr/share/cursor/chrome-sandbox',
  desktopDir: pathe.join(os.homedir(), '.local/share/applications'),
  logFile: pathe.join(os.homedir(), '.cursor_updater.log'),
  tempDir: os.tmpdir(),
  requestTimeoutMs: 15_000,
  downloadTimeoutMs: 30 * 60_000,
  requiredCommands: ['sudo', 'update-desktop-database'],
});

/**
 * Environment variables that override string settings
 */
const ENV_OVERRIDES = {
  CURSOR_UPDATER_PLATFORM: 'platform',
  CURSOR_UPDATER_API_ENDPOINT: 'apiEndpoint',
  CURSOR_UPDATER_INSTALL_DIR: 'installDir',
  CURSOR_UPDATER_BACKUP_DIR: 'backupDir',
  CURSOR_UPDATER_SYMLINK: 'symlinkPath',
  CURSOR_UPDATER_LOG_FILE: 'logFile',
} as const satisfies Record<string, keyof UpdaterConfig>;

/**
 * Merges overrides onto the defaults. When the install directory is moved
 * and no metadata file is given, the metadata file follows it.
 */
export function resolveConfig(
  overrides: Partial<UpdaterConfig> = {},
): UpdaterConfig {
  const config: UpdaterConfig = {
    ...DEFAULT_CONFIG,
    requiredCommands: [...DEFAULT_CONFIG.requiredCommands],
    ...overrides,
  };

  if (overrides.installDir && !overrides.metadataFile) {
    config.metadataFile = pathe.join(
      overrides.installDir,
      pathe.basename(DEFAULT_CONFIG.metadataFile),
    );
  }

  return config;
}

/**
 * Reads `CURSOR_UPDATER_*` overrides from an environment
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): Partial<UpdaterConfig> {
  const overrides: Partial<UpdaterConfig> = {};

  for (const [variable, key] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable]?.trim();
    if (value) {
      overrides[key] = value;
    }
  }

  return overrides;
}
