// engine/requirements/requirement.ts — npm package specifiers used as requirement tokens

import * as os from 'os';
import * as path from 'path';
import type { LocalRequirement, Requirement } from '../types.js';

// Lowercase npm package name, optionally scoped.
const PACKAGE_NAME = /^(?:@[a-z0-9][a-z0-9._~-]*\/)?[a-z0-9][a-z0-9._~-]*$/;

const LOCAL_PREFIXES = ['file:', './', '../', '/', '~/'];

export function isValidPackageName(name: string): boolean {
  return PACKAGE_NAME.test(name);
}

function isLocalSpecifier(specifier: string): boolean {
  return LOCAL_PREFIXES.some((prefix) => specifier.startsWith(prefix)) || specifier === '.' || specifier === '..';
}

/**
 * Parse a single requirement token:
 *
 *   name                  any published version
 *   name@range            published version range (`^1.2.0`, `1.0`, `latest`)
 *   @scope/name@range     scoped package
 *   name@./path           local requirement (also `../`, `/`, `~/` and `file:` prefixes)
 *
 * Returns null when the token is not a valid specifier.
 */
export function parseRequirement(token: string): Requirement | null {
  const separator = token.indexOf('@', token.startsWith('@') ? 1 : 0);
  const name = separator === -1 ? token : token.slice(0, separator);
  if (!isValidPackageName(name)) return null;

  if (separator === -1) {
    return { kind: 'published', name, range: null };
  }

  const specifier = token.slice(separator + 1);
  if (specifier === '') return null;

  if (isLocalSpecifier(specifier)) {
    const localPath = specifier.startsWith('file:') ? specifier.slice('file:'.length) : specifier;
    if (localPath === '') return null;
    return { kind: 'local', name, path: localPath };
  }

  return { kind: 'published', name, range: specifier };
}

/** Canonical token for a requirement; local paths are kept as written. */
export function formatRequirement(requirement: Requirement): string {
  if (requirement.kind === 'local') {
    return `${requirement.name}@file:${requirement.path}`;
  }
  return requirement.range === null ? requirement.name : `${requirement.name}@${requirement.range}`;
}

/** Installer argument for a requirement, with local paths made absolute. */
export function requirementToArg(requirement: Requirement, projectDir: string): string {
  if (requirement.kind === 'local') {
    return `${requirement.name}@file:${resolveLocalPath(requirement, projectDir)}`;
  }
  return formatRequirement(requirement);
}

export function resolveLocalPath(requirement: LocalRequirement, projectDir: string): string {
  if (requirement.path === '~' || requirement.path.startsWith('~/')) {
    return path.join(os.homedir(), requirement.path.slice(1));
  }
  return path.resolve(projectDir, requirement.path);
}
