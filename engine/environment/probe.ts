// engine/environment/probe.ts — Decide whether to run in place, install, or re-execute

import { IncompatibleLockFormatError } from '../errors.js';
import type { LockFile } from '../lockfile/lock-file.js';
import type { LockStore } from '../lockfile/lock-store.js';
import type { RequirementSpec } from '../requirements/spec.js';
import type { BuildEnvConfig, ProbeResult } from '../types.js';
import type { EnvironmentStore } from './environment-store.js';

export interface ProbeInput {
  config: Pick<BuildEnvConfig, 'managed' | 'alwaysUpdateLocalRequirements'>;
  spec: RequirementSpec;
  environment: EnvironmentStore;
  lockStore: LockStore;
}

type LockOutcome = { lock: LockFile | null; error: IncompatibleLockFormatError | null };

function loadLock(lockStore: LockStore): LockOutcome {
  try {
    return { lock: lockStore.load(), error: null };
  } catch (err) {
    if (err instanceof IncompatibleLockFormatError) return { lock: null, error: err };
    throw err;
  }
}

/**
 * Compute the dispatch decision. Checks run in priority order and the first
 * match wins:
 *
 * 1. managed mode                      -> RUN_IN_PLACE (nothing is read from disk)
 * 2. no installed environment          -> INSTALL_THEN_RUN / missing
 * 3. lock absent, unreadable or for a
 *    different spec; environment built
 *    from a different spec             -> INSTALL_THEN_RUN / stale
 * 4. local requirements + always-update -> INSTALL_THEN_RUN / local-requirement-refresh
 * 5. otherwise                         -> REEXEC_INTO_ENVIRONMENT / fresh
 */
export function probeEnvironment(input: ProbeInput): ProbeResult {
  const { config, spec, environment, lockStore } = input;

  if (config.managed) {
    return {
      decision: 'RUN_IN_PLACE',
      reason: 'managed',
      detail: 'KRAKEN_MANAGED=1: running inside the build environment',
    };
  }

  const marker = environment.readMarker();
  if (marker === null) {
    return {
      decision: 'INSTALL_THEN_RUN',
      reason: 'missing',
      detail: `no build environment at ${environment.path}`,
    };
  }

  const fingerprint = spec.fingerprint();
  const { lock, error } = loadLock(lockStore);

  if (error !== null) {
    return { decision: 'INSTALL_THEN_RUN', reason: 'stale', detail: error.message };
  }
  if (lock === null) {
    return { decision: 'INSTALL_THEN_RUN', reason: 'stale', detail: `no lock file at ${lockStore.path}` };
  }
  if (lock.fingerprint !== fingerprint) {
    return {
      decision: 'INSTALL_THEN_RUN',
      reason: 'stale',
      detail: 'lock file was written for different requirements',
    };
  }
  if (marker.fingerprint !== fingerprint) {
    return {
      decision: 'INSTALL_THEN_RUN',
      reason: 'stale',
      detail: 'build environment was installed from different requirements',
    };
  }

  if (config.alwaysUpdateLocalRequirements && spec.localRequirements().length > 0) {
    const names = spec.localRequirements().map((r) => r.name);
    return {
      decision: 'INSTALL_THEN_RUN',
      reason: 'local-requirement-refresh',
      detail: `KRAKEN_ALWAYS_UPDATE_LOCAL_REQUIREMENTS=1: refreshing ${names.join(', ')}`,
    };
  }

  return {
    decision: 'REEXEC_INTO_ENVIRONMENT',
    reason: 'fresh',
    detail: `build environment at ${environment.path} is up to date`,
  };
}
