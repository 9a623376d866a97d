// engine/environment/installer.ts — Create, upgrade, re-lock and remove the build environment

import { VERSION } from '../config.js';
import {
  BuildEnvError,
  EnvironmentMissingForLockOnlyError,
  IncompatibleLockFormatError,
  InstallationFailureError,
} from '../errors.js';
import { createLockFile, createLockMetadata, lockToArgs } from '../lockfile/lock-file.js';
import type { LockFile } from '../lockfile/lock-file.js';
import type { LockStore } from '../lockfile/lock-store.js';
import { createLogger } from '../logger.js';
import type { RequirementSpec } from '../requirements/spec.js';
import type { BuildEnvConfig, InstallMode, Reporter } from '../types.js';
import type { EnvironmentStore } from './environment-store.js';
import type { PackageInstaller } from './package-installer.js';

const log = createLogger('installer');

export interface InstallerDeps {
  config: Pick<BuildEnvConfig, 'projectDir'>;
  environment: EnvironmentStore;
  lockStore: LockStore;
  packages: PackageInstaller;
  reporter: Reporter;
  clock?: () => Date;
}

export interface InstallOutcome {
  mode: InstallMode;
  /** The environment directory did not exist before this call. */
  created: boolean;
  installedFrom: 'requirements' | 'lockfile' | 'none';
  lock: LockFile;
}

export class EnvironmentInstaller {
  private readonly deps: InstallerDeps;
  private readonly clock: () => Date;

  constructor(deps: InstallerDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Bring the environment in line with `spec`.
   *
   * - `fresh`: install the spec, or the lock's exact pins when the lock was
   *   written for this very spec.
   * - `upgrade`: ignore the lock, re-resolve the spec and rewrite the lock.
   * - `lock-only`: leave packages alone and rewrite the lock from what the
   *   existing environment contains.
   *
   * @throws {EnvironmentMissingForLockOnlyError} for `lock-only` without an environment installed for `spec`
   * @throws {InstallationFailureError} if the package installer fails; the
   *   environment is then left without a marker, or removed if this call created it
   */
  async install(spec: RequirementSpec, mode: InstallMode): Promise<InstallOutcome> {
    if (mode === 'lock-only') {
      return this.relock(spec);
    }

    const { environment, lockStore, packages, reporter, config } = this.deps;
    const fingerprint = spec.fingerprint();
    const created = !environment.exists();
    const existingLock = mode === 'fresh' ? this.loadMatchingLock(fingerprint) : null;

    reporter.info(
      created
        ? `Creating build environment (${environment.path}) ...`
        : `Reusing build environment (${environment.path})`,
    );

    environment.create();
    environment.clearMarker();

    try {
      if (existingLock !== null) {
        reporter.info('Installing from lock file ...');
        await packages.install(environment.path, { args: lockToArgs(existingLock, config.projectDir), upgrade: false });
        this.writeMarker(fingerprint);
        return { mode, created, installedFrom: 'lockfile', lock: existingLock };
      }

      reporter.info(mode === 'upgrade' ? 'Upgrading build environment from requirements ...' : 'Installing from requirements ...');
      await packages.install(environment.path, { args: spec.toArgs(config.projectDir), upgrade: mode === 'upgrade' });
      const pinned = await packages.freeze(environment.path);
      const lock = createLockFile(spec, pinned, createLockMetadata(this.clock()));
      lockStore.save(lock);
      this.writeMarker(fingerprint);
      log.info(`locked ${Object.keys(pinned).length} package(s) to ${lockStore.path}`);
      return { mode, created, installedFrom: 'requirements', lock };
    } catch (err) {
      this.rollback(created);
      throw toInstallationFailure(err);
    }
  }

  /** Delete the environment directory and the lock file. Returns true if anything was removed. */
  remove(): boolean {
    const { environment, lockStore, reporter } = this.deps;
    const removedEnvironment = environment.delete();
    const removedLock = lockStore.delete();
    if (removedEnvironment) reporter.info(`Removed build environment (${environment.path})`);
    if (removedLock) reporter.info(`Removed lock file (${lockStore.path})`);
    return removedEnvironment || removedLock;
  }

  private async relock(spec: RequirementSpec): Promise<InstallOutcome> {
    const { environment, lockStore, packages, reporter } = this.deps;
    const marker = environment.readMarker();
    if (marker === null) {
      throw new EnvironmentMissingForLockOnlyError(environment.path);
    }
    // The lock is keyed to the spec's fingerprint, so it may only pin what was installed for that spec.
    if (marker.fingerprint !== spec.fingerprint()) {
      throw new EnvironmentMissingForLockOnlyError(environment.path, marker.fingerprint);
    }

    let pinned: Record<string, string>;
    try {
      pinned = await packages.freeze(environment.path);
    } catch (err) {
      throw toInstallationFailure(err);
    }
    const required = new Set(spec.requirements.map((r) => r.name));
    const unrequired = Object.keys(pinned).filter((name) => !required.has(name)).sort();
    if (unrequired.length > 0) {
      reporter.warn(`Locking packages that are not required: ${unrequired.join(', ')}`);
    }

    const lock = createLockFile(spec, pinned, createLockMetadata(this.clock()));
    lockStore.save(lock);
    reporter.info(`Wrote lock file (${lockStore.path})`);
    return { mode: 'lock-only', created: false, installedFrom: 'none', lock };
  }

  private loadMatchingLock(fingerprint: string): LockFile | null {
    const { lockStore, reporter } = this.deps;
    let lock: LockFile | null;
    try {
      lock = lockStore.load();
    } catch (err) {
      if (!(err instanceof IncompatibleLockFormatError)) throw err;
      reporter.warn(`${err.message}; installing from requirements instead`);
      return null;
    }
    if (lock !== null && lock.fingerprint !== fingerprint) {
      reporter.warn(`Lock file (${lockStore.path}) is outdated; re-resolving requirements and rewriting it`);
      return null;
    }
    return lock;
  }

  private writeMarker(fingerprint: string): void {
    this.deps.environment.writeMarker({
      fingerprint,
      createdAt: this.clock().toISOString(),
      cliVersion: VERSION,
    });
  }

  private rollback(created: boolean): void {
    const { environment } = this.deps;
    try {
      if (created) {
        environment.delete();
      } else {
        environment.clearMarker();
      }
    } catch (err) {
      log.error(`could not roll back build environment ${environment.path}: ${String(err)}`);
    }
  }
}

function toInstallationFailure(err: unknown): BuildEnvError {
  if (err instanceof BuildEnvError) return err;
  const reason = err instanceof Error ? err.message : String(err);
  return new InstallationFailureError(`Installing the build environment failed: ${reason}`, {}, { cause: err });
}
