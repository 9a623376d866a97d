// engine/requirements/implied.ts — Requirements every managed build environment carries

import { CLI_PACKAGE_NAME } from '../config.js';
import type { Requirement } from '../types.js';

export interface ImpliedRequirementOptions {
  /** Install the CLI from `localPackageRoot` instead of the registry. */
  develop: boolean;
  version: string;
  localPackageRoot: string;
}

/**
 * First version that may ship breaking changes: the next minor while the
 * major is 0, the next major afterwards.
 */
export function nextBreakingVersion(version: string): string {
  const [major, minor] = version.split('.').map((part) => Number.parseInt(part, 10));
  if (!Number.isInteger(major) || !Number.isInteger(minor)) {
    throw new Error(`Invalid version "${version}"`);
  }
  return major === 0 ? `0.${minor + 1}.0` : `${major + 1}.0.0`;
}

/**
 * The environment must contain the CLI itself so the re-executed command has
 * something to run. In develop mode it points at the local checkout.
 */
export function getImpliedRequirements(options: ImpliedRequirementOptions): Requirement[] {
  if (options.develop) {
    return [{ kind: 'local', name: CLI_PACKAGE_NAME, path: options.localPackageRoot }];
  }
  return [
    {
      kind: 'published',
      name: CLI_PACKAGE_NAME,
      range: `>=${options.version} <${nextBreakingVersion(options.version)}`,
    },
  ];
}
