import type { UpdaterConfig } from './config';
import { describeError, err, ok, type Result } from './errors';
import type { Logger } from './logger';
import { extractVersion } from './version';

/**
 * The latest release as reported by the remote endpoint
 */
export interface RemoteRelease {
  downloadUrl: string;

  /**
   * Parsed from the download location, or "Unknown"
   */
  version: string;
}

export type ReleaseConfig = Pick<
  UpdaterConfig,
  'apiEndpoint' | 'platform' | 'releaseTrack' | 'userAgent' | 'requestTimeoutMs'
>;

/**
 * Builds the release query URL
 */
export function buildReleaseUrl(config: ReleaseConfig): string {
  const url = new URL(config.apiEndpoint);
  url.searchParams.set('platform', config.platform);
  url.searchParams.set('releaseTrack', config.releaseTrack);
  return url.toString();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Asks the remote endpoint for the latest release. Not retried.
 * @param config Endpoint settings
 * @param logger The logger instance
 * @param signal Aborts the request when the run is interrupted
 */
export async function fetchLatestRelease(
  config: ReleaseConfig,
  logger: Logger,
  signal?: AbortSignal,
): Promise<Result<RemoteRelease, 'NetworkError' | 'RemoteProtocolError' | 'Interrupted'>> {
  const url = buildReleaseUrl(config);
  logger.debug(`Fetching release metadata from: ${url}`);

  const controller = new AbortController();
  const onAbort = () => controller.abort();
  if (signal?.aborted) {
    controller.abort();
  }
  signal?.addEventListener('abort', onAbort, { once: true });
  const timeoutId = setTimeout(() => controller.abort(), config.requestTimeoutMs);

  let body: unknown = null;
  try {
    const response = await fetch(url, {
      headers: {
        Accept: 'application/json',
        'User-Agent': config.userAgent,
        'Cache-Control': 'no-cache',
      },
      signal: controller.signal,
    });

    if (!response.ok) {
      return err(
        'NetworkError',
        `Release endpoint returned ${response.status} ${response.statusText}`,
      );
    }

    try {
      body = await response.json();
    } catch (error) {
      return err(
        'RemoteProtocolError',
        `Release endpoint returned invalid JSON: ${describeError(error)}`,
        error,
      );
    }
  } catch (error) {
    if (signal?.aborted) {
      return err('Interrupted', 'Interrupted while fetching release metadata');
    }
    if (controller.signal.aborted) {
      return err(
        'NetworkError',
        `Release endpoint timed out after ${config.requestTimeoutMs}ms`,
        error,
      );
    }
    return err(
      'NetworkError',
      `Could not reach release endpoint: ${describeError(error)}`,
      error,
    );
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onAbort);
  }

  const downloadUrl = isRecord(body) ? body.downloadUrl : undefined;
  if (typeof downloadUrl !== 'string' || !downloadUrl) {
    return err('RemoteProtocolError', 'downloadUrl missing from API response');
  }

  const release: RemoteRelease = {
    downloadUrl,
    version: extractVersion(downloadUrl),
  };
  logger.debug('Resolved latest release:', release);
  return ok(release);
}
