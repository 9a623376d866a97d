// engine/index.ts — Top-level orchestrator: wires project -> probe -> installer -> dispatcher

import { ModuleBuildEngine } from './dispatch/build-engine.js';
import type { BuildGraphEngine } from './dispatch/build-engine.js';
import { Dispatcher } from './dispatch/dispatcher.js';
import type { ReexecOptions } from './dispatch/reexec.js';
import { describeEnvironment, FileEnvironmentStore } from './environment/environment-store.js';
import type { EnvironmentStore } from './environment/environment-store.js';
import { EnvironmentInstaller } from './environment/installer.js';
import type { InstallOutcome } from './environment/installer.js';
import { NpmPackageInstaller } from './environment/package-installer.js';
import type { PackageInstaller } from './environment/package-installer.js';
import { probeEnvironment } from './environment/probe.js';
import { IncompatibleLockFormatError, ManagedEnvironmentError } from './errors.js';
import { FileLockStore } from './lockfile/lock-store.js';
import type { LockStore } from './lockfile/lock-store.js';
import { readRequirementSpec } from './project.js';
import type { RequirementSpec } from './requirements/spec.js';
import { createConsoleReporter } from './reporter.js';
import type { BuildEnvConfig, DispatchDecision, ProbeReason, ProbeResult, Reporter } from './types.js';

export { loadConfig } from './config.js';
export { formatError, BuildEnvError } from './errors.js';
export { extractRequirements } from './requirements/extractor.js';
export { RequirementSpec } from './requirements/spec.js';
export type {
  BuildEnvConfig,
  DispatchDecision,
  ProbeReason,
  ProbeResult,
  Reporter,
  InstallOutcome,
  BuildGraphEngine,
  PackageInstaller,
  LockStore,
  EnvironmentStore,
};

export interface BuildEnvironmentOptions {
  config: BuildEnvConfig;
  /** Environment handed to the re-executed child. */
  childEnv?: Readonly<Record<string, string | undefined>>;
  packages?: PackageInstaller;
  engine?: BuildGraphEngine;
  environment?: EnvironmentStore;
  lockStore?: LockStore;
  reporter?: Reporter;
  reexec?: (options: ReexecOptions) => Promise<number>;
  clock?: () => Date;
}

export interface EnvironmentStatus {
  environmentPath: string;
  exists: boolean;
  environmentFingerprint: string | null;
  requirementsFingerprint: string;
  lockPath: string;
  lockFingerprint: string | null;
  decision: DispatchDecision;
  reason: ProbeReason;
  detail: string;
}

/**
 * The operations behind the `kraken` command surface. One instance per
 * invocation; the requirement spec is read from the build script on first
 * use and kept for the lifetime of the instance.
 */
export class BuildEnvironment {
  readonly config: BuildEnvConfig;
  private readonly environment: EnvironmentStore;
  private readonly lockStore: LockStore;
  private readonly installer: EnvironmentInstaller;
  private readonly options: BuildEnvironmentOptions;
  private readonly reporter: Reporter;
  private cachedSpec: RequirementSpec | null = null;

  constructor(options: BuildEnvironmentOptions) {
    this.options = options;
    this.config = options.config;
    this.environment = options.environment ?? new FileEnvironmentStore(options.config.environmentDir);
    this.lockStore = options.lockStore ?? new FileLockStore(options.config.lockPath);
    this.reporter = options.reporter ?? createConsoleReporter();
    this.installer = new EnvironmentInstaller({
      config: options.config,
      environment: this.environment,
      lockStore: this.lockStore,
      packages: options.packages ?? new NpmPackageInstaller(options.config.npmCommand),
      reporter: this.reporter,
      clock: options.clock,
    });
  }

  /** @throws {MalformedRequirementSpecError} before anything on disk is touched */
  requirementSpec(): RequirementSpec {
    if (this.cachedSpec === null) {
      this.cachedSpec = readRequirementSpec(this.config);
    }
    return this.cachedSpec;
  }

  probe(): ProbeResult {
    return probeEnvironment({
      config: this.config,
      spec: this.requirementSpec(),
      environment: this.environment,
      lockStore: this.lockStore,
    });
  }

  /** Install the environment when the probe asks for it; resolves with that probe result. */
  async ensureEnvironment(): Promise<ProbeResult> {
    return this.createDispatcher().ensureEnvironment();
  }

  /** Run a build-graph command, re-executing inside the environment unless already there. */
  async dispatch(args: readonly string[]): Promise<number> {
    return this.createDispatcher().dispatch(args);
  }

  status(): EnvironmentStatus {
    this.assertNotManaged('status');
    const spec = this.requirementSpec();
    const probe = this.probe();
    const descriptor = describeEnvironment(this.environment, this.config.managed);
    return {
      environmentPath: descriptor.path,
      exists: this.environment.exists(),
      environmentFingerprint: descriptor.fingerprint,
      requirementsFingerprint: spec.fingerprint(),
      lockPath: this.lockStore.path,
      lockFingerprint: this.lockFingerprint(),
      decision: probe.decision,
      reason: probe.reason,
      detail: probe.detail,
    };
  }

  /** Ensure the environment is installed. Resolves with null when it already was up to date. */
  async install(): Promise<InstallOutcome | null> {
    this.assertNotManaged('install');
    const probe = this.probe();
    if (probe.decision !== 'INSTALL_THEN_RUN') {
      this.reporter.info(`Build environment is up to date (${this.environment.path})`);
      return null;
    }
    return this.installer.install(this.requirementSpec(), 'fresh');
  }

  async upgrade(): Promise<InstallOutcome> {
    this.assertNotManaged('upgrade');
    return this.installer.install(this.requirementSpec(), 'upgrade');
  }

  async lock(): Promise<InstallOutcome> {
    this.assertNotManaged('lock');
    return this.installer.install(this.requirementSpec(), 'lock-only');
  }

  /** Delete environment and lock file. Resolves with false when there was nothing to delete. */
  remove(): boolean {
    this.assertNotManaged('remove');
    const removed = this.installer.remove();
    if (!removed) {
      this.reporter.info(`Build environment does not exist (${this.environment.path})`);
    }
    return removed;
  }

  private createDispatcher(): Dispatcher {
    const spec = this.requirementSpec();
    return new Dispatcher({
      config: this.config,
      spec,
      probe: () => this.probe(),
      installer: this.installer,
      environment: this.environment,
      engine: this.options.engine ?? new ModuleBuildEngine(this.config.engineModule, process.env),
      reporter: this.reporter,
      childEnv: this.options.childEnv ?? {},
      reexec: this.options.reexec,
    });
  }

  private lockFingerprint(): string | null {
    try {
      return this.lockStore.load()?.fingerprint ?? null;
    } catch (err) {
      if (err instanceof IncompatibleLockFormatError) return null;
      throw err;
    }
  }

  private assertNotManaged(operation: string): void {
    if (this.config.managed) {
      throw new ManagedEnvironmentError(operation);
    }
  }
}
