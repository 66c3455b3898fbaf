import { spawn } from 'child_process';
import { CommandError, err, ok, type Result } from './errors';
import type { Logger } from './logger';

export interface CommandOptions {
  cwd?: string;
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

/**
 * Runs external commands; rejects with a CommandError on a non-zero exit
 */
export interface CommandRunner {
  run(
    command: string,
    args: string[],
    options?: CommandOptions,
  ): Promise<CommandOutput>;
}

/**
 * Creates a runner backed by child processes. Stdin stays attached to the
 * terminal so that sudo can ask for a password.
 */
export function createCommandRunner(logger: Logger): CommandRunner {
  return {
    run(command, args, options = {}) {
      const commandLine = [command, ...args].join(' ');
      logger.debug(`Running: ${commandLine}`);

      return new Promise<CommandOutput>((resolve, reject) => {
        const child = spawn(command, args, {
          cwd: options.cwd,
          stdio: ['inherit', 'pipe', 'pipe'],
        });

        let stdout = '';
        let stderr = '';
        let failedToStart = false;
        child.stdout.setEncoding('utf-8');
        child.stderr.setEncoding('utf-8');
        child.stdout.on('data', (chunk: string) => {
          stdout += chunk;
        });
        child.stderr.on('data', (chunk: string) => {
          stderr += chunk;
        });

        child.on('error', (error) => {
          failedToStart = true;
          logger.error(`Command failed to start: ${commandLine}`);
          reject(new CommandError(commandLine, null, stdout, error.message));
        });

        child.on('close', (code) => {
          if (failedToStart) {
            return;
          }
          if (code === 0) {
            resolve({ stdout, stderr });
            return;
          }
          logger.error(`Command failed: ${commandLine}`);
          logger.error(`Exit code: ${code}`);
          logger.error(`stdout: ${stdout}`);
          logger.error(`stderr: ${stderr}`);
          reject(new CommandError(commandLine, code, stdout, stderr));
        });
      });
    },
  };
}

/**
 * Checks that every required system command can be found on PATH
 * @param commands Command names to look up
 */
export async function checkDependencies(
  commands: string[],
  runner: CommandRunner,
  logger: Logger,
): Promise<Result<void, 'DependencyError'>> {
  const missing: string[] = [];

  for (const command of commands) {
    try {
      await runner.run('which', [command]);
    } catch (error) {
      logger.debug(`Dependency lookup failed for ${command}:`, error);
      missing.push(command);
    }
  }

  if (missing.length > 0) {
    return err('DependencyError', `Missing dependencies: ${missing.join(', ')}`);
  }
  return ok(undefined);
}
