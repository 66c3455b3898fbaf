import { UNKNOWN_VERSION } from './version';

/**
 * What a check-only run found
 */
export type CheckReport =
  | { shape: 'not-installed'; latest: string }
  | { shape: 'latest-unknown'; installed: string }
  | { shape: 'update-available'; installed: string; latest: string };

export function buildCheckReport(
  installed: string | null,
  latest: string,
): CheckReport {
  if (installed === null) {
    return { shape: 'not-installed', latest };
  }
  if (latest === UNKNOWN_VERSION) {
    return { shape: 'latest-unknown', installed };
  }
  return { shape: 'update-available', installed, latest };
}

export function formatCheckReport(
  report: CheckReport,
  displayName: string,
): string {
  switch (report.shape) {
    case 'not-installed':
      return `${displayName} not installed. Latest version available: ${report.latest}`;
    case 'latest-unknown':
      return `Currently installed: ${report.installed}. Cannot determine latest version.`;
    case 'update-available':
      return `Update available: ${report.installed} → ${report.latest}`;
  }
}
