// engine/cli.ts — Command surface for kraken: build-graph commands and `env` management

import chalk from 'chalk';
import { Command, CommanderError } from 'commander';
import { DEFAULT_BUILD_DIR, loadConfig, VERSION } from './config.js';
import { BuildEnvError, formatError } from './errors.js';
import { BuildEnvironment } from './index.js';
import type { BuildEnvironmentOptions, EnvironmentStatus } from './index.js';
import { setLogLevel } from './logger.js';
import { createConsoleReporter } from './reporter.js';

export interface CliOptions {
  env: Readonly<Record<string, string | undefined>>;
  cwd: string;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  /** Replace collaborators (installer, engine, ...); the config is always built from argv and env. */
  overrides?: Omit<BuildEnvironmentOptions, 'config'>;
}

type GlobalOptions = {
  verbose: number;
  quiet?: boolean;
  buildDir?: string;
  projectDir?: string;
};

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

function formatStatus(status: EnvironmentStatus): string {
  const exists = status.exists ? '' : ' (does not exist)';
  return [
    ` environment path: ${status.environmentPath}${exists}`,
    ` environment hash: ${status.environmentFingerprint ?? 'None'}`,
    `requirements hash: ${status.requirementsFingerprint}`,
    `    lockfile hash: ${status.lockFingerprint ?? 'None'}`,
    `         decision: ${status.decision} (${status.reason}: ${status.detail})`,
  ].join('\n');
}

/**
 * Run the CLI for `argv` (arguments after the executable) and resolve with
 * the exit status. Never throws: failures are printed and mapped to a status.
 */
export async function runCli(argv: readonly string[], options: CliOptions): Promise<number> {
  const stdout = options.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = options.stderr ?? ((text: string) => process.stderr.write(text));
  let exitCode = 0;

  const program = new Command();
  program
    .name('kraken')
    .description('Run kraken builds inside a managed, locked build environment')
    .version(VERSION)
    .option('-v, --verbose', 'show more logs (repeat for debug output)', increaseVerbosity, 0)
    .option('-q, --quiet', 'show less logs')
    .option('-b, --build-dir <path>', 'the build directory to write to', DEFAULT_BUILD_DIR)
    .option('-p, --project-dir <path>', 'the root project directory', '.')
    .exitOverride()
    .configureOutput({ writeOut: stdout, writeErr: stderr });

  const environment = (): BuildEnvironment => {
    const opts = program.opts<GlobalOptions>();
    const config = loadConfig(options.env, {
      cwd: options.cwd,
      projectDir: opts.projectDir,
      buildDir: opts.buildDir,
      verbose: opts.verbose,
      quiet: opts.quiet,
    });
    setLogLevel(config.logLevel);
    return new BuildEnvironment({
      reporter: createConsoleReporter(stderr),
      childEnv: options.env,
      ...options.overrides,
      config,
    });
  };

  program
    .command('run')
    .description('execute one or more kraken tasks')
    .argument('[targets...]', 'one or more targets to build')
    .allowUnknownOption()
    .action(async () => {
      exitCode = await environment().dispatch(argv);
    });

  program
    .command('q')
    .description('run queries against the task graph')
    .argument('<query>', 'query to run (ls, describe, up-to-date, viz)')
    .argument('[targets...]', 'targets to query')
    .allowUnknownOption()
    .action(async () => {
      exitCode = await environment().dispatch(argv);
    });

  const env = program.command('env').description('manage the build environment');

  env
    .command('status')
    .description('provide the status of the build environment')
    .action(() => {
      stdout(`${formatStatus(environment().status())}\n`);
    });

  env
    .command('install')
    .description('ensure the build environment is installed')
    .action(async () => {
      await environment().install();
    });

  env
    .command('upgrade')
    .description('upgrade the build environment and lock file')
    .action(async () => {
      await environment().upgrade();
    });

  env
    .command('lock')
    .description('create or update the lock file')
    .action(async () => {
      await environment().lock();
    });

  env
    .command('remove')
    .description('remove the build environment')
    .action(() => {
      environment().remove();
    });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    stderr(`${chalk.red(formatError(err))}\n`);
    return err instanceof BuildEnvError ? err.exitCode : 1;
  }
  return exitCode;
}
