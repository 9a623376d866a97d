import { describe, it, expect } from 'vitest';
import { EnvironmentInstaller } from '../../engine/environment/installer.js';
import { probeEnvironment } from '../../engine/environment/probe.js';
import {
  EnvironmentMissingForLockOnlyError,
  InstallationFailureError,
} from '../../engine/errors.js';
import { createLockFile } from '../../engine/lockfile/lock-file.js';
import { RequirementSpec } from '../../engine/requirements/spec.js';
import {
  ENV_DIR,
  FakePackageInstaller,
  FIXED_CLOCK,
  LOCK_PATH,
  makeConfig,
  MemoryEnvironmentStore,
  MemoryLockStore,
  PROJECT_DIR,
  RecordingReporter,
} from '../helpers/fakes.js';

const SPEC = new RequirementSpec({
  requirements: [
    { kind: 'published', name: 'kraken-cli', range: '>=0.1.0 <0.2.0' },
    { kind: 'published', name: 'kraken-std', range: '^0.4.0' },
  ],
});

const METADATA = {
  createdAt: '2024-01-01T00:00:00.000Z',
  nodeVersion: 'v20.12.0',
  platform: 'linux-x64',
  cliVersion: '0.1.0',
};

function setup(pinned: Record<string, string> = { 'kraken-cli': '0.1.4', 'kraken-std': '0.4.2' }) {
  const environment = new MemoryEnvironmentStore();
  const lockStore = new MemoryLockStore();
  const packages = new FakePackageInstaller(pinned);
  const reporter = new RecordingReporter();
  const installer = new EnvironmentInstaller({
    config: makeConfig(),
    environment,
    lockStore,
    packages,
    reporter,
    clock: FIXED_CLOCK,
  });
  return { environment, lockStore, packages, reporter, installer };
}

describe('EnvironmentInstaller', () => {
  describe('fresh install', () => {
    it('creates the environment, writes the lock and then the marker', async () => {
      const { environment, lockStore, packages, reporter, installer } = setup();

      const outcome = await installer.install(SPEC, 'fresh');

      expect(outcome.created).toBe(true);
      expect(outcome.installedFrom).toBe('requirements');
      expect(packages.installs).toEqual([{ args: ['kraken-cli@>=0.1.0 <0.2.0', 'kraken-std@^0.4.0'], upgrade: false }]);
      expect(lockStore.load()?.pinned).toEqual({ 'kraken-cli': '0.1.4', 'kraken-std': '0.4.2' });
      expect(lockStore.load()?.fingerprint).toBe(SPEC.fingerprint());
      expect(lockStore.load()?.metadata.createdAt).toBe('2024-05-01T12:00:00.000Z');
      expect(environment.readMarker()).toEqual({
        fingerprint: SPEC.fingerprint(),
        createdAt: '2024-05-01T12:00:00.000Z',
        cliVersion: '0.1.0',
      });
      expect(reporter.lines).toEqual([
        `info: Creating build environment (${ENV_DIR}) ...`,
        'info: Installing from requirements ...',
      ]);
    });

    it('leaves an environment the probe considers fresh', async () => {
      const { environment, lockStore, installer } = setup();
      await installer.install(SPEC, 'fresh');
      const result = probeEnvironment({
        config: { managed: false, alwaysUpdateLocalRequirements: false },
        spec: SPEC,
        environment,
        lockStore,
      });
      expect(result.decision).toBe('REEXEC_INTO_ENVIRONMENT');
    });

    it('installs the exact pins of a matching lock file without rewriting it', async () => {
      const { lockStore, packages, reporter, installer } = setup();
      lockStore.save(createLockFile(SPEC, { 'kraken-std': '0.4.1', 'kraken-cli': '0.1.2' }, METADATA));

      const outcome = await installer.install(SPEC, 'fresh');

      expect(outcome.installedFrom).toBe('lockfile');
      expect(packages.installs).toEqual([{ args: ['kraken-cli@0.1.2', 'kraken-std@0.4.1'], upgrade: false }]);
      expect(packages.freezes).toBe(0);
      expect(lockStore.saves).toBe(1);
      expect(lockStore.load()?.metadata.createdAt).toBe('2024-01-01T00:00:00.000Z');
      expect(reporter.lines).toContain('info: Installing from lock file ...');
    });

    it('is idempotent', async () => {
      const { environment, lockStore, installer } = setup();
      await installer.install(SPEC, 'fresh');
      const firstLock = lockStore.text;
      const firstMarker = environment.readMarker();

      const again = await installer.install(SPEC, 'fresh');

      expect(again.created).toBe(false);
      expect(lockStore.text).toBe(firstLock);
      expect(environment.readMarker()).toEqual(firstMarker);
    });

    it('re-resolves when the lock was written for other requirements', async () => {
      const { lockStore, packages, reporter, installer } = setup();
      const other = new RequirementSpec({ requirements: [{ kind: 'published', name: 'kraken-std', range: null }] });
      lockStore.save(createLockFile(other, { 'kraken-std': '0.3.0' }, METADATA));

      const outcome = await installer.install(SPEC, 'fresh');

      expect(outcome.installedFrom).toBe('requirements');
      expect(packages.installs[0].args).toEqual(['kraken-cli@>=0.1.0 <0.2.0', 'kraken-std@^0.4.0']);
      expect(lockStore.load()?.fingerprint).toBe(SPEC.fingerprint());
      expect(reporter.lines).toContain(
        `warn: Lock file (${LOCK_PATH}) is outdated; re-resolving requirements and rewriting it`,
      );
    });

    it('replaces an unreadable lock file', async () => {
      const { lockStore, reporter, installer } = setup();
      lockStore.text = 'not json';

      await installer.install(SPEC, 'fresh');

      expect(lockStore.load()?.fingerprint).toBe(SPEC.fingerprint());
      expect(reporter.lines).toContain(
        `warn: Cannot read lock file ${LOCK_PATH}: not valid JSON; installing from requirements instead`,
      );
    });

    it('reuses an existing directory', async () => {
      const { environment, reporter, installer } = setup();
      environment.create();
      const outcome = await installer.install(SPEC, 'fresh');
      expect(outcome.created).toBe(false);
      expect(reporter.lines[0]).toBe(`info: Reusing build environment (${ENV_DIR})`);
    });
  });

  describe('upgrade', () => {
    it('ignores a matching lock file and re-resolves', async () => {
      const { lockStore, packages, reporter, installer } = setup({ 'kraken-cli': '0.1.9', 'kraken-std': '0.4.7' });
      lockStore.save(createLockFile(SPEC, { 'kraken-cli': '0.1.2', 'kraken-std': '0.4.1' }, METADATA));

      const outcome = await installer.install(SPEC, 'upgrade');

      expect(outcome.installedFrom).toBe('requirements');
      expect(packages.installs).toEqual([{ args: ['kraken-cli@>=0.1.0 <0.2.0', 'kraken-std@^0.4.0'], upgrade: true }]);
      expect(lockStore.load()?.pinned).toEqual({ 'kraken-cli': '0.1.9', 'kraken-std': '0.4.7' });
      expect(reporter.lines).toContain('info: Upgrading build environment from requirements ...');
    });
  });

  describe('failure', () => {
    it('removes a directory it created', async () => {
      const { environment, lockStore, packages, installer } = setup();
      packages.failure = new Error('registry unreachable');

      await expect(installer.install(SPEC, 'fresh')).rejects.toThrow(
        'Installing the build environment failed: registry unreachable',
      );
      expect(environment.exists()).toBe(false);
      expect(lockStore.exists()).toBe(false);
    });

    it('keeps a reused directory but drops its marker', async () => {
      const { environment, lockStore, packages, installer } = setup();
      await installer.install(SPEC, 'fresh');
      const lockBefore = lockStore.text;
      packages.failure = new InstallationFailureError('npm install exited with status 1');

      await expect(installer.install(SPEC, 'upgrade')).rejects.toBeInstanceOf(InstallationFailureError);
      expect(environment.exists()).toBe(true);
      expect(environment.readMarker()).toBeNull();
      expect(lockStore.text).toBe(lockBefore);
    });

    it('leaves the environment missing for the next probe', async () => {
      const { environment, lockStore, packages, installer } = setup();
      await installer.install(SPEC, 'fresh');
      packages.failure = new Error('disk full');
      await expect(installer.install(SPEC, 'upgrade')).rejects.toThrow(InstallationFailureError);

      const result = probeEnvironment({
        config: { managed: false, alwaysUpdateLocalRequirements: false },
        spec: SPEC,
        environment,
        lockStore,
      });
      expect(result.reason).toBe('missing');
    });
  });

  describe('lock-only', () => {
    it('refuses without an installed environment and changes nothing', async () => {
      const { environment, lockStore, packages, installer } = setup();

      await expect(installer.install(SPEC, 'lock-only')).rejects.toBeInstanceOf(EnvironmentMissingForLockOnlyError);
      expect(environment.exists()).toBe(false);
      expect(lockStore.exists()).toBe(false);
      expect(packages.freezes).toBe(0);
    });

    it('rewrites the lock from the installed packages', async () => {
      const { environment, lockStore, packages, reporter, installer } = setup({ 'kraken-cli': '0.1.3', extra: '1.0.0' });
      environment.install(SPEC.fingerprint());

      const outcome = await installer.install(SPEC, 'lock-only');

      expect(outcome).toMatchObject({ mode: 'lock-only', created: false, installedFrom: 'none' });
      expect(packages.installs).toEqual([]);
      expect(lockStore.load()?.pinned).toEqual({ 'kraken-cli': '0.1.3', extra: '1.0.0' });
      expect(reporter.lines).toEqual([
        'warn: Locking packages that are not required: extra',
        `info: Wrote lock file (${LOCK_PATH})`,
      ]);
    });

    it('refuses an environment installed for other requirements', async () => {
      const { environment, lockStore, packages, installer } = setup();
      const previous = new RequirementSpec({
        requirements: [{ kind: 'published', name: 'kraken-cli', range: '>=0.1.0 <0.2.0' }],
      });
      await installer.install(previous, 'fresh');
      const lockBefore = lockStore.text;

      await expect(installer.install(SPEC, 'lock-only')).rejects.toThrow(
        `Cannot write lock file: the build environment at ${ENV_DIR} was installed for different requirements. Run \`kraken env install\` first.`,
      );
      expect(lockStore.text).toBe(lockBefore);
      expect(packages.freezes).toBe(1);

      await installer.install(SPEC, 'fresh');
      expect(packages.installs[1]).toEqual({ args: ['kraken-cli@>=0.1.0 <0.2.0', 'kraken-std@^0.4.0'], upgrade: false });
      expect(lockStore.load()?.fingerprint).toBe(SPEC.fingerprint());
      const result = probeEnvironment({
        config: { managed: false, alwaysUpdateLocalRequirements: false },
        spec: SPEC,
        environment,
        lockStore,
      });
      expect(result.decision).toBe('REEXEC_INTO_ENVIRONMENT');
    });
  });

  describe('remove', () => {
    it('deletes the environment and the lock file', async () => {
      const { environment, lockStore, reporter, installer } = setup();
      await installer.install(SPEC, 'fresh');
      reporter.lines.length = 0;

      expect(installer.remove()).toBe(true);
      expect(environment.exists()).toBe(false);
      expect(lockStore.exists()).toBe(false);
      expect(reporter.lines).toEqual([
        `info: Removed build environment (${ENV_DIR})`,
        `info: Removed lock file (${LOCK_PATH})`,
      ]);
    });

    it('succeeds when nothing exists', () => {
      const { reporter, installer } = setup();
      expect(installer.remove()).toBe(false);
      expect(installer.remove()).toBe(false);
      expect(reporter.lines).toEqual([]);
    });
  });

  it('passes local requirements as absolute paths', async () => {
    const { packages, installer } = setup();
    const spec = new RequirementSpec({ requirements: [{ kind: 'local', name: 'tooling', path: './tooling' }] });
    await installer.install(spec, 'fresh');
    expect(packages.installs[0].args).toEqual([`tooling@file:${PROJECT_DIR}/tooling`]);
  });
});
