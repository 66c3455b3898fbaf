import fs from 'fs';
import { createWriteStream } from 'fs';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { describeError, err, ok, type Result } from './errors';
import type { Logger } from './logger';

/**
 * Bytes received so far; total is null when the server sends no usable
 * content length
 */
export interface DownloadProgress {
  received: number;
  total: number | null;
}

export type ProgressListener = (progress: DownloadProgress) => void;

export interface DownloadOptions {
  /**
   * Limit for the whole transfer in milliseconds
   */
  timeoutMs: number;

  userAgent?: string;

  signal?: AbortSignal;

  onProgress?: ProgressListener;
}

export interface DownloadedArtifact {
  path: string;
  bytes: number;
}

type ResponseBody = NonNullable<Response['body']>;

/**
 * Yields the body's chunks, reporting each one. A consumer that stops
 * early cancels the body.
 */
async function* readChunks(
  body: ResponseBody,
  onChunk: (size: number) => void,
  logger: Logger,
): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  let finished = false;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      onChunk(value.byteLength);
      yield value;
    }
  } finally {
    if (!finished) {
      await reader.cancel().catch((error: unknown) => {
        logger.debug('Could not cancel response body:', error);
      });
    }
    reader.releaseLock();
  }
}

/**
 * Parses a content-length header; zero, absent and malformed become null
 */
export function parseContentLength(header: string | null): number | null {
  const length = Number.parseInt(header ?? '', 10);
  return Number.isFinite(length) && length > 0 ? length : null;
}

/**
 * Streams a download into a new file at targetPath and marks it executable.
 * On failure the partially written file is left for the caller to remove.
 * @param url The URL to download
 * @param targetPath Path of the file to create; must not exist
 * @param options Timeout, interruption and progress reporting
 * @param logger The logger instance
 */
export async function downloadArtifact(
  url: string,
  targetPath: string,
  options: DownloadOptions,
  logger: Logger,
): Promise<Result<DownloadedArtifact, 'DownloadError' | 'Interrupted'>> {
  logger.info(`Downloading from ${url}`);

  const { signal, onProgress } = options;
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  if (signal?.aborted) {
    controller.abort();
  }
  signal?.addEventListener('abort', onAbort, { once: true });
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  let received = 0;
  try {
    const response = await fetch(url, {
      headers: options.userAgent ? { 'User-Agent': options.userAgent } : {},
      signal: controller.signal,
    });

    if (!response.ok) {
      return err(
        'DownloadError',
        `Download failed: ${response.status} ${response.statusText}`,
      );
    }
    if (!response.body) {
      return err('DownloadError', 'Download failed: response body is empty');
    }

    const total = parseContentLength(response.headers.get('content-length'));
    logger.debug(`Content length: ${total ?? 'unknown'}`);

    await pipeline(
      Readable.from(
        readChunks(response.body, (size) => {
          received += size;
          onProgress?.({ received, total });
        }, logger),
      ),
      createWriteStream(targetPath, { flags: 'wx', mode: 0o600 }),
    );

    if (total !== null && received !== total) {
      logger.warn(`Received ${received} bytes, server announced ${total}`);
    }

    const { mode } = await fs.promises.stat(targetPath);
    await fs.promises.chmod(targetPath, mode | 0o100);

    logger.info(`Downloaded ${received} bytes to ${targetPath}`);
    return ok({ path: targetPath, bytes: received });
  } catch (error) {
    if (signal?.aborted) {
      return err('Interrupted', 'Interrupted during download');
    }
    if (controller.signal.aborted) {
      return err(
        'DownloadError',
        `Download timed out after ${options.timeoutMs}ms (${received} bytes received)`,
        error,
      );
    }
    return err('DownloadError', `Download failed: ${describeError(error)}`, error);
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onAbort);
  }
}
