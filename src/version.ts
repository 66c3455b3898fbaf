import fs from 'fs';
import semver from 'semver';
import type { UpdateError } from './errors';
import type { Logger } from './logger';

/**
 * Reported when no version can be found in the download location
 */
export const UNKNOWN_VERSION = 'Unknown';

const VERSION_IN_URL = /\b(\d+\.\d+\.\d+)\b/;

/**
 * Reads the installed version from a KEY=VALUE metadata file
 * @param metadataFile Path to the installed metadata file
 * @param versionKey Key holding the version
 * @param logger The logger instance
 * @returns The installed version, or null when absent or unreadable
 */
export function readInstalledVersion(
  metadataFile: string,
  versionKey: string,
  logger: Logger,
): string | null {
  let content: string;
  try {
    if (!fs.statSync(metadataFile, { throwIfNoEntry: false })?.isFile()) {
      logger.debug(`No installed metadata at ${metadataFile}`);
      return null;
    }
    content = fs.readFileSync(metadataFile, 'utf-8');
  } catch (error) {
    logger.warn(`Could not read metadata file ${metadataFile}:`, error);
    return null;
  }

  const prefix = `${versionKey}=`;
  for (const line of content.split(/\r?\n/)) {
    if (line.startsWith(prefix)) {
      const value = line.slice(prefix.length).trim();
      return value || null;
    }
  }

  logger.debug(`${versionKey} not found in ${metadataFile}`);
  return null;
}

/**
 * Pulls the first dotted numeric triple out of a download location
 */
export function extractVersion(downloadUrl: string): string {
  const match = VERSION_IN_URL.exec(downloadUrl);
  return match ? match[1] : UNKNOWN_VERSION;
}

export type UpdateReason =
  | 'forced'
  | 'not-installed'
  | 'latest-unknown'
  | 'newer'
  | 'not-newer'
  | 'string-mismatch'
  | 'string-match';

export interface UpdateDecision {
  updateNeeded: boolean;
  reason: UpdateReason;

  /**
   * Set when the comparison fell back to string equality
   */
  parseError?: UpdateError<'VersionParseError'>;
}

export interface VersionPair {
  installed: string | null;
  latest: string;
  force?: boolean;
}

/**
 * Decides whether the latest release should replace the installed one.
 * Unparseable versions degrade to a plain string comparison.
 */
export function isUpdateNeeded(
  { installed, latest, force = false }: VersionPair,
  logger: Logger,
): UpdateDecision {
  if (force) {
    return { updateNeeded: true, reason: 'forced' };
  }
  if (installed === null) {
    return { updateNeeded: true, reason: 'not-installed' };
  }
  if (latest === UNKNOWN_VERSION) {
    return { updateNeeded: true, reason: 'latest-unknown' };
  }

  if (!semver.valid(installed) || !semver.valid(latest)) {
    const parseError: UpdateError<'VersionParseError'> = {
      kind: 'VersionParseError',
      message: `Could not compare versions semantically (installed: ${installed}, latest: ${latest})`,
    };
    logger.warn(`${parseError.message}, falling back to string comparison`);
    return installed === latest
      ? { updateNeeded: false, reason: 'string-match', parseError }
      : { updateNeeded: true, reason: 'string-mismatch', parseError };
  }

  const updateNeeded = semver.gt(latest, installed);
  logger.debug(
    `Version comparison: Installed=${installed}, Latest=${latest}, ` +
      `Update needed: ${updateNeeded}`,
  );
  return { updateNeeded, reason: updateNeeded ? 'newer' : 'not-newer' };
}
