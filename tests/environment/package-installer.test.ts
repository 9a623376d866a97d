import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { NpmPackageInstaller } from '../../engine/environment/package-installer.js';
import type { CommandResult, CommandRunner } from '../../engine/environment/package-installer.js';
import { InstallationFailureError } from '../../engine/errors.js';

interface Call {
  command: string;
  args: readonly string[];
  captureStdout: boolean;
}

function fakeRunner(results: CommandResult[], calls: Call[]): CommandRunner {
  return async (command, args, options) => {
    calls.push({ command, args, captureStdout: options.captureStdout });
    const next = results.shift();
    if (!next) throw new Error('unexpected command');
    return next;
  };
}

describe('NpmPackageInstaller', () => {
  let envDir: string;
  let calls: Call[];

  beforeEach(() => {
    envDir = fs.mkdtempSync(path.join(os.tmpdir(), 'kraken-npm-'));
    calls = [];
  });
  afterEach(() => {
    fs.rmSync(envDir, { recursive: true, force: true });
  });

  describe('install', () => {
    it('runs npm install into the environment prefix', async () => {
      const installer = new NpmPackageInstaller('npm', fakeRunner([{ exitCode: 0, stdout: '' }], calls));

      await installer.install(envDir, { args: ['--registry', 'https://npm.example.org', 'a@^1.0.0'], upgrade: false });

      expect(calls).toEqual([
        {
          command: 'npm',
          args: ['install', '--prefix', envDir, '--no-audit', '--no-fund', '--registry', 'https://npm.example.org', 'a@^1.0.0'],
          captureStdout: false,
        },
      ]);
      expect(JSON.parse(fs.readFileSync(path.join(envDir, 'package.json'), 'utf-8'))).toEqual({
        name: 'kraken-build-environment',
        private: true,
        description: 'Managed by kraken. Do not edit.',
      });
    });

    it('drops the previous resolution when upgrading', async () => {
      fs.writeFileSync(path.join(envDir, 'package-lock.json'), '{}');
      const installer = new NpmPackageInstaller('npm', fakeRunner([{ exitCode: 0, stdout: '' }], calls));

      await installer.install(envDir, { args: ['a'], upgrade: true });

      expect(fs.existsSync(path.join(envDir, 'package-lock.json'))).toBe(false);
      expect(calls[0].args).toEqual(['install', '--prefix', envDir, '--no-audit', '--no-fund', '--prefer-online', 'a']);
    });

    it('fails on a non-zero exit status', async () => {
      const installer = new NpmPackageInstaller('npm', fakeRunner([{ exitCode: 1, stdout: '' }], calls));
      await expect(installer.install(envDir, { args: ['a'], upgrade: false })).rejects.toThrow(
        'npm install exited with status 1',
      );
    });

    it('fails when npm cannot be started', async () => {
      const installer = new NpmPackageInstaller('missing-npm', fakeRunner([], calls));
      await expect(installer.install(envDir, { args: ['a'], upgrade: false })).rejects.toThrow(
        new InstallationFailureError('cannot run missing-npm'),
      );
    });
  });

  describe('freeze', () => {
    it('reads top-level versions from npm ls', async () => {
      const stdout = JSON.stringify({
        name: 'kraken-build-environment',
        dependencies: {
          'kraken-std': { version: '0.4.2', resolved: 'https://npm.example.org/kraken-std-0.4.2.tgz' },
          tooling: { version: '0.0.1', resolved: 'file:../../tooling' },
          broken: { missing: true },
        },
      });
      const installer = new NpmPackageInstaller('npm', fakeRunner([{ exitCode: 1, stdout }], calls));

      expect(await installer.freeze(envDir)).toEqual({ 'kraken-std': '0.4.2', tooling: '0.0.1' });
      expect(calls[0]).toEqual({
        command: 'npm',
        args: ['ls', '--json', '--depth=0', '--prefix', envDir],
        captureStdout: true,
      });
    });

    it('returns nothing for an empty environment', async () => {
      const installer = new NpmPackageInstaller('npm', fakeRunner([{ exitCode: 0, stdout: '{}' }], calls));
      expect(await installer.freeze(envDir)).toEqual({});
    });

    it('fails on unreadable output', async () => {
      const installer = new NpmPackageInstaller('npm', fakeRunner([{ exitCode: 2, stdout: 'npm ERR!' }], calls));
      await expect(installer.freeze(envDir)).rejects.toThrow('npm ls produced no readable output (status 2)');
    });
  });
});
