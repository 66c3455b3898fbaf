/**
 * Failure kinds a pipeline step can report
 */
export type UpdateErrorKind =
  | 'NetworkError'
  | 'RemoteProtocolError'
  | 'VersionParseError'
  | 'BackupError'
  | 'DownloadError'
  | 'ExtractionError'
  | 'InstallError'
  | 'LinkError'
  | 'PrivilegeError'
  | 'DependencyError'
  | 'Interrupted';

/**
 * A failure reported by a pipeline step
 */
export interface UpdateError<K extends UpdateErrorKind = UpdateErrorKind> {
  kind: K;

  /**
   * One-line, user-facing cause
   */
  message: string;

  /**
   * The underlying error, kept for the log
   */
  cause?: unknown;
}

export interface Ok<T> {
  ok: true;
  value: T;
}

export interface Err<K extends UpdateErrorKind = UpdateErrorKind> {
  ok: false;
  error: UpdateError<K>;
}

/**
 * Outcome of a single pipeline step
 */
export type Result<T, K extends UpdateErrorKind = UpdateErrorKind> =
  | Ok<T>
  | Err<K>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<K extends UpdateErrorKind>(
  kind: K,
  message: string,
  cause?: unknown,
): Err<K> {
  return { ok: false, error: { kind, message, cause } };
}

/**
 * Kinds after which the run degrades instead of unwinding
 */
const RECOVERABLE_KINDS: ReadonlySet<UpdateErrorKind> = new Set([
  'VersionParseError',
  'BackupError',
  'LinkError',
]);

export function isFatalKind(kind: UpdateErrorKind): boolean {
  return !RECOVERABLE_KINDS.has(kind);
}

/**
 * Raised by a command runner when an external command exits non-zero
 */
export class CommandError extends Error {
  constructor(
    readonly command: string,
    readonly exitCode: number | null,
    readonly stdout: string,
    readonly stderr: string,
  ) {
    const detail = stderr.trim().split('\n').pop();
    super(
      `Command failed (exit ${exitCode ?? 'signal'}): ${command}${detail ? `: ${detail}` : ''}`,
    );
    this.name = 'CommandError';
  }
}

/**
 * Renders an unknown thrown value as a single line
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
