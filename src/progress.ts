import type { DownloadProgress, ProgressListener } from './download';

/**
 * Where progress lines are written
 */
export interface ProgressStream {
  write(chunk: string): unknown;
}

export function formatProgress({ received, total }: DownloadProgress): string | null {
  if (total === null) {
    return null;
  }
  const percent = Math.min(Math.floor((received * 100) / total), 100);
  return `Download progress: ${percent}% [${received} / ${total} bytes]`;
}

/**
 * Renders download progress on a single terminal line. Nothing is printed
 * when the total size is unknown.
 */
export function createProgressPrinter(
  stream: ProgressStream = process.stdout,
): ProgressListener {
  let lastLine: string | null = null;

  return (progress) => {
    const line = formatProgress(progress);
    if (line === null || line === lastLine) {
      return;
    }
    lastLine = line;
    stream.write(`\r${line}`);
    if (progress.total !== null && progress.received >= progress.total) {
      stream.write('\n');
    }
  };
}
