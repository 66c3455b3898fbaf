import fs from 'fs';
import pathe from 'pathe';
import { format } from 'util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  /**
   * Whether to emit debug messages
   */
  debug: boolean;

  /**
   * Durable log file; console only when omitted
   */
  logFile?: string;
}

/**
 * Creates a logger that writes to the console and appends to a log file
 */
export function createLogger(options: LoggerOptions) {
  let logFile = options.logFile;

  function append(level: LogLevel, message: string): void {
    if (!logFile) {
      return;
    }
    const line = `${new Date().toISOString()} - ${level.toUpperCase()} - ${message}\n`;
    try {
      fs.mkdirSync(pathe.dirname(logFile), { recursive: true });
      fs.appendFileSync(logFile, line, 'utf-8');
    } catch (error) {
      // One warning, then console only
      console.warn(
        '[cursor-updater:warn]',
        `Cannot write log file ${logFile}: ${format(error)}`,
      );
      logFile = undefined;
    }
  }

  function emit(level: LogLevel, args: unknown[]): void {
    const message = format(...args);
    const prefix = `[cursor-updater:${level}]`;
    if (level === 'warn' || level === 'error') {
      console.warn(prefix, message);
    } else {
      console.log(prefix, message);
    }
    append(level, message);
  }

  return {
    /**
     * Logs a message only when debug is enabled
     */
    debug: (...args: unknown[]) => {
      if (options.debug) {
        emit('debug', args);
      }
    },
    info: (...args: unknown[]) => {
      emit('info', args);
    },
    warn: (...args: unknown[]) => {
      emit('warn', args);
    },
    error: (...args: unknown[]) => {
      emit('error', args);
    },
    /**
     * The file still receiving log lines, if any
     */
    get logFile(): string | undefined {
      return logFile;
    },
  };
}

export type Logger = ReturnType<typeof createLogger>;

/**
 * A logger that discards everything
 */
export function createSilentLogger(): Logger {
  const logger = createLogger({ debug: false });
  return {
    ...logger,
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}
