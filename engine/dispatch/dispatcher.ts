// engine/dispatch/dispatcher.ts — Probe, install if needed, then run in place or re-execute

import { CLI_BIN_NAME } from '../config.js';
import type { EnvironmentInstaller } from '../environment/installer.js';
import type { EnvironmentStore } from '../environment/environment-store.js';
import { createLogger } from '../logger.js';
import type { RequirementSpec } from '../requirements/spec.js';
import type { BuildEnvConfig, DispatchState, ProbeResult, Reporter } from '../types.js';
import type { BuildGraphEngine } from './build-engine.js';
import { reexec } from './reexec.js';
import type { ReexecOptions } from './reexec.js';

const log = createLogger('dispatcher');

export interface DispatcherDeps {
  config: Pick<BuildEnvConfig, 'projectDir' | 'buildDir'>;
  spec: RequirementSpec;
  probe: () => ProbeResult;
  installer: EnvironmentInstaller;
  environment: EnvironmentStore;
  engine: BuildGraphEngine;
  reporter: Reporter;
  /** Environment for the re-executed child; KRAKEN_MANAGED=1 is added on top. */
  childEnv: Readonly<Record<string, string | undefined>>;
  reexec?: (options: ReexecOptions) => Promise<number>;
}

const TRANSITIONS: Record<DispatchState, readonly DispatchState[]> = {
  NotProbed: ['Probed'],
  Probed: ['Installing', 'Dispatched'],
  Installing: ['Installed', 'Failed'],
  Installed: ['Dispatched'],
  Failed: [],
  Dispatched: ['Terminal'],
  Terminal: [],
};

/**
 * Single-use driver for one invocation:
 *
 *   NotProbed -> Probed -> [Installing -> Installed] -> Dispatched -> Terminal
 *                          Installing -> Failed (fatal, not retried)
 */
export class Dispatcher {
  private current: DispatchState = 'NotProbed';
  private result: ProbeResult | null = null;
  private exit: number | null = null;

  constructor(private readonly deps: DispatcherDeps) {}

  get state(): DispatchState {
    return this.current;
  }

  get exitCode(): number | null {
    return this.exit;
  }

  /** Probe without touching anything. Repeated calls return the first result. */
  decide(): ProbeResult {
    if (this.result === null) {
      this.result = this.deps.probe();
      this.transition('Probed');
      log.debug(`decision ${this.result.decision} (${this.result.reason}): ${this.result.detail}`);
    }
    return this.result;
  }

  /**
   * Probe and, when the environment is missing or stale, install it. Resolves
   * with the probe result that was acted on.
   */
  async ensureEnvironment(): Promise<ProbeResult> {
    const result = this.decide();
    if (result.decision !== 'INSTALL_THEN_RUN' || this.current !== 'Probed') {
      return result;
    }

    if (result.reason === 'stale') {
      this.deps.reporter.warn(`Build environment is outdated (${result.detail}). Reinstalling ...`);
    } else if (result.reason === 'local-requirement-refresh') {
      this.deps.reporter.info(`Upgrading local requirements (${result.detail})`);
    }

    this.transition('Installing');
    try {
      await this.deps.installer.install(this.deps.spec, 'fresh');
    } catch (err) {
      this.transition('Failed');
      throw err;
    }
    this.transition('Installed');
    return result;
  }

  /** Run the build for `args` and resolve with the exit status to terminate with. */
  async dispatch(args: readonly string[]): Promise<number> {
    const result = await this.ensureEnvironment();
    const { config, spec, engine, environment, reporter } = this.deps;

    this.transition('Dispatched');
    let code: number;
    if (result.decision === 'RUN_IN_PLACE') {
      code = await engine.run({
        projectDir: config.projectDir,
        buildDir: config.buildDir,
        args,
        searchPaths: spec.resolveSearchPaths(config.projectDir),
      });
    } else {
      const command = environment.binPath(CLI_BIN_NAME);
      reporter.info(`Dispatching \`${[CLI_BIN_NAME, ...args].join(' ')}\` to build environment (${environment.path})`);
      const run = this.deps.reexec ?? reexec;
      code = await run({
        command,
        args,
        cwd: process.cwd(),
        env: { ...this.deps.childEnv, KRAKEN_MANAGED: '1' },
      });
    }

    this.exit = code;
    this.transition('Terminal');
    return code;
  }

  private transition(next: DispatchState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid dispatcher transition ${this.current} -> ${next}`);
    }
    this.current = next;
  }
}
