import chalk from 'chalk';
import { Command } from 'commander';
import pathe from 'pathe';
import { configFromEnv, resolveConfig, type UpdaterConfig } from './config';
import { checkAndUpdate, installFromFile, type CheckAndUpdateOptions } from './index';
import { createLogger, type Logger } from './logger';
import { createProgressPrinter } from './progress';
import { fetchLatestRelease } from './release';
import { formatCheckReport } from './report';
import type { UpdateOutcome } from './updater';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

interface InstallCommandOptions {
  backup: boolean;
  verbose?: boolean;
}

interface UpdateCommandOptions extends InstallCommandOptions {
  force?: boolean;
  check?: boolean;
}

export function exitCodeFor(outcome: UpdateOutcome): number {
  if (outcome.status !== 'aborted') {
    return EXIT_OK;
  }
  return outcome.error.kind === 'Interrupted' ? EXIT_INTERRUPTED : EXIT_FAILURE;
}

/**
 * Lines shown to the user once a run has finished
 */
export function describeOutcome(
  outcome: UpdateOutcome,
  config: UpdaterConfig,
  logFile: string | undefined,
): string[] {
  switch (outcome.status) {
    case 'up-to-date':
      return [];
    case 'check-only':
      return [formatCheckReport(outcome.report, config.displayName)];
    case 'success':
      return [
        ...outcome.warnings.map((warning) => chalk.yellow(`Warning: ${warning.message}`)),
        '',
        chalk.green(`✓ ${config.displayName} has been upgraded to version ${outcome.version}`),
        `  Run \`${pathe.basename(config.symlinkPath)}\` to launch`,
      ];
    case 'aborted': {
      if (outcome.error.kind === 'Interrupted') {
        return ['', 'Update cancelled'];
      }
      const lines = ['', chalk.red(`Error: ${outcome.error.message}`)];
      if (outcome.phase === 'install' && !outcome.installDirPresent) {
        lines.push(chalk.red(`No installation is left at ${config.installDir}.`));
        if (outcome.backupPath) {
          lines.push(`Restore it with: sudo cp -a ${outcome.backupPath} ${config.installDir}`);
        }
      }
      if (logFile) {
        lines.push(`See log for details: ${logFile}`);
      }
      return lines;
    }
  }
}

/**
 * Aborts the returned signal on SIGINT or SIGTERM until disposed
 */
function watchInterrupts(logger: Logger): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSignal = (name: NodeJS.Signals) => {
    logger.info(`Received ${name}, stopping after the current step`);
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  return {
    signal: controller.signal,
    dispose: () => {
      process.removeListener('SIGINT', onSignal);
      process.removeListener('SIGTERM', onSignal);
    },
  };
}

/**
 * Runs one mutating command with interrupt handling, prints its outcome
 * and reports the exit code
 */
async function runWithOutcome(
  config: UpdaterConfig,
  verbose: boolean,
  setExitCode: (code: number) => void,
  run: (options: CheckAndUpdateOptions) => Promise<UpdateOutcome>,
): Promise<void> {
  const logger = createLogger({ debug: verbose, logFile: config.logFile });
  logger.info(`${config.displayName} Updater starting`);

  const interrupts = watchInterrupts(logger);
  let outcome: UpdateOutcome;
  try {
    outcome = await run({
      debug: verbose,
      logger,
      signal: interrupts.signal,
      onProgress: createProgressPrinter(),
    });
  } finally {
    interrupts.dispose();
  }

  const lines = describeOutcome(outcome, config, logger.logFile);
  const print = outcome.status === 'aborted' ? console.error : console.log;
  for (const line of lines) {
    print(line);
  }
  setExitCode(exitCodeFor(outcome));
}

export function createProgram(
  env: NodeJS.ProcessEnv,
  setExitCode: (code: number) => void,
): Command {
  const overrides = configFromEnv(env);
  const config = resolveConfig(overrides);
  const program = new Command();

  program
    .name('cursor-updater')
    .description(`Update ${config.displayName} editor on Linux`)
    .option('--force', 'Force update even if already up to date')
    .option('--no-backup', 'Skip backing up existing installation')
    .option('--check', "Only check for updates, don't install")
    .option('-v, --verbose', 'Enable verbose logging')
    .action(async (options: UpdateCommandOptions) => {
      await runWithOutcome(config, options.verbose ?? false, setExitCode, (run) =>
        checkAndUpdate({
          ...run,
          force: options.force,
          skipBackup: !options.backup,
          checkOnly: options.check,
          config: overrides,
        }),
      );
    });

  program
    .command('install')
    .description('Install or upgrade from a local AppImage file')
    .argument('<appimage>', 'Path to the AppImage')
    .option('--no-backup', 'Skip backing up existing installation')
    .option('-v, --verbose', 'Enable verbose logging')
    .action(async (appImage: string, options: InstallCommandOptions) => {
      await runWithOutcome(config, options.verbose ?? false, setExitCode, (run) =>
        installFromFile(pathe.resolve(appImage), {
          ...run,
          skipBackup: !options.backup,
          config: overrides,
        }),
      );
    });

  program
    .command('latest')
    .description('Print the latest available version and its download URL')
    .action(async () => {
      const logger = createLogger({ debug: false });
      const resolved = await fetchLatestRelease(config, logger);
      if (!resolved.ok) {
        console.error(chalk.red(`Error: ${resolved.error.message}`));
        setExitCode(EXIT_FAILURE);
        return;
      }
      console.log(
        `Latest ${config.displayName} version for ${config.platform}: ${resolved.value.version}`,
      );
      console.log(`Download URL: ${resolved.value.downloadUrl}`);
      setExitCode(EXIT_OK);
    });

  return program;
}

/**
 * Parses argv, runs the chosen command and resolves to the exit code
 */
export async function main(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  let exitCode = EXIT_OK;
  const program = createProgram(env, (code) => {
    exitCode = code;
  });
  await program.parseAsync(argv);
  return exitCode;
}
