import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { InvalidConfigError } from './errors.js';
import type { BuildEnvConfig, LogLevel } from './types.js';

export const VERSION = '0.1.0';
export const CLI_PACKAGE_NAME = 'kraken-cli';
export const CLI_BIN_NAME = 'kraken';

export const DEFAULT_BUILD_DIR = 'build';
export const DEFAULT_ENGINE_MODULE = 'kraken-core';
export const LOCK_FILE_NAME = '.kraken.lock';

/** Root of the running package: `engine/` (sources) and `dist/` (build) both sit one level below it. */
export const PACKAGE_ROOT = fileURLToPath(new URL('..', import.meta.url));

export interface ConfigOptions {
  cwd?: string;
  projectDir?: string;
  buildDir?: string;
  verbose?: number;
  quiet?: boolean;
}

const flag = z
  .string()
  .optional()
  .transform((value) => value === '1');

const EnvSchema = z.object({
  KRAKEN_MANAGED: flag,
  KRAKEN_DEVELOP: flag,
  KRAKEN_ALWAYS_UPDATE_LOCAL_REQUIREMENTS: flag,
  KRAKEN_DEVELOP_ROOT: z.string().min(1).optional(),
  KRAKEN_ENGINE: z.string().min(1).optional(),
  KRAKEN_NPM: z.string().min(1).optional(),
  KRAKEN_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional(),
});

export function levelFromVerbosity(verbose: number, quiet: boolean): LogLevel {
  if (verbose >= 2) return 'debug';
  if (verbose >= 1) return 'info';
  if (quiet) return 'error';
  return 'warn';
}

/**
 * Build the configuration struct from an environment map and CLI options.
 * An explicit KRAKEN_LOG_LEVEL overrides the -v/-q flags.
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>>,
  options: ConfigOptions = {},
): BuildEnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  const vars = parsed.data;

  const cwd = options.cwd ?? process.cwd();
  const projectDir = path.resolve(cwd, options.projectDir ?? '.');
  const buildDir = path.resolve(cwd, options.buildDir ?? DEFAULT_BUILD_DIR);
  const localPackageRoot = path.resolve(cwd, vars.KRAKEN_DEVELOP_ROOT ?? PACKAGE_ROOT);
  if (vars.KRAKEN_DEVELOP && !fs.existsSync(path.join(localPackageRoot, 'package.json'))) {
    throw new InvalidConfigError([`KRAKEN_DEVELOP_ROOT: no package.json in ${localPackageRoot}`]);
  }

  return Object.freeze({
    projectDir,
    buildDir,
    environmentDir: path.join(buildDir, '.kraken', 'env'),
    lockPath: path.join(projectDir, LOCK_FILE_NAME),
    managed: vars.KRAKEN_MANAGED,
    develop: vars.KRAKEN_DEVELOP,
    alwaysUpdateLocalRequirements: vars.KRAKEN_ALWAYS_UPDATE_LOCAL_REQUIREMENTS,
    localPackageRoot,
    engineModule: vars.KRAKEN_ENGINE ?? DEFAULT_ENGINE_MODULE,
    npmCommand: vars.KRAKEN_NPM ?? 'npm',
    logLevel: vars.KRAKEN_LOG_LEVEL ?? levelFromVerbosity(options.verbose ?? 0, options.quiet ?? false),
  });
}
