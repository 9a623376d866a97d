// engine/environment/package-installer.ts — npm-backed package installation collaborator

import { spawn } from 'node:child_process';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { InstallationFailureError } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('package-installer');

export interface InstallRequest {
  /** Installer arguments: requirement specifiers and installer flags. */
  args: readonly string[];
  /** Re-resolve every requirement instead of reusing previously resolved versions. */
  upgrade: boolean;
}

/**
 * Installs requirements into an environment directory and reports what got
 * installed. Failures reject; the caller owns rollback.
 */
export interface PackageInstaller {
  install(environmentDir: string, request: InstallRequest): Promise<void>;
  /** Exact versions of the top-level packages in the environment. */
  freeze(environmentDir: string): Promise<Record<string, string>>;
}

// ─── Command Runner ──────────────────────────────────────────────────────────

export interface CommandResult {
  exitCode: number;
  stdout: string;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: { cwd: string; captureStdout: boolean },
) => Promise<CommandResult>;

/**
 * Run a command to completion. Captured stdout is returned; otherwise the
 * child's stdout is sent to our stderr. stderr is always inherited.
 */
export const runCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      stdio: ['ignore', options.captureStdout ? 'pipe' : process.stderr, 'inherit'],
    });
    let stdout = '';
    child.stdout?.setEncoding('utf-8');
    child.stdout?.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.once('error', reject);
    child.once('close', (code, signal) => {
      resolve({ exitCode: code ?? (signal ? 1 : 0), stdout });
    });
  });

// ─── npm ─────────────────────────────────────────────────────────────────────

const NpmLsSchema = z.object({
  dependencies: z.record(z.object({ version: z.string().optional() }).passthrough()).optional(),
});

const ENVIRONMENT_PACKAGE = {
  name: 'kraken-build-environment',
  private: true,
  description: 'Managed by kraken. Do not edit.',
};

export class NpmPackageInstaller implements PackageInstaller {
  constructor(
    private readonly npmCommand: string = 'npm',
    private readonly run: CommandRunner = runCommand,
  ) {}

  async install(environmentDir: string, request: InstallRequest): Promise<void> {
    // Start from an empty manifest so the environment holds exactly the requested packages.
    fs.writeFileSync(
      path.join(environmentDir, 'package.json'),
      `${JSON.stringify(ENVIRONMENT_PACKAGE, null, 2)}\n`,
      'utf-8',
    );
    if (request.upgrade) {
      fs.rmSync(path.join(environmentDir, 'package-lock.json'), { force: true });
    }

    const args = ['install', '--prefix', environmentDir, '--no-audit', '--no-fund'];
    if (request.upgrade) args.push('--prefer-online');
    args.push(...request.args);

    log.info(`${this.npmCommand} ${args.join(' ')}`);
    const result = await this.exec(args, environmentDir, false);
    if (result.exitCode !== 0) {
      throw new InstallationFailureError(`${this.npmCommand} install exited with status ${result.exitCode}`, {
        command: this.npmCommand,
        exitCode: result.exitCode,
      });
    }
  }

  async freeze(environmentDir: string): Promise<Record<string, string>> {
    const args = ['ls', '--json', '--depth=0', '--prefix', environmentDir];
    const result = await this.exec(args, environmentDir, true);

    // `npm ls` exits non-zero for problems such as extraneous packages but still prints the tree.
    let raw: unknown;
    try {
      raw = JSON.parse(result.stdout);
    } catch (err) {
      throw new InstallationFailureError(
        `${this.npmCommand} ls produced no readable output (status ${result.exitCode})`,
        { command: this.npmCommand, exitCode: result.exitCode },
        { cause: err },
      );
    }
    const parsed = NpmLsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InstallationFailureError(`${this.npmCommand} ls produced unexpected output`, {
        command: this.npmCommand,
      });
    }

    const pinned: Record<string, string> = {};
    for (const [name, info] of Object.entries(parsed.data.dependencies ?? {})) {
      if (info.version === undefined) {
        log.warn(`package "${name}" is listed without a version and is left out of the lock file`);
        continue;
      }
      pinned[name] = info.version;
    }
    return pinned;
  }

  private async exec(args: string[], cwd: string, captureStdout: boolean): Promise<CommandResult> {
    try {
      return await this.run(this.npmCommand, args, { cwd, captureStdout });
    } catch (err) {
      throw new InstallationFailureError(
        `cannot run ${this.npmCommand}`,
        { command: this.npmCommand },
        { cause: err },
      );
    }
  }
}
