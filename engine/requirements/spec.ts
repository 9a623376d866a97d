// engine/requirements/spec.ts — Immutable requirement specification and its fingerprint

import * as crypto from 'crypto';
import * as path from 'path';
import { formatRequirement, parseRequirement, requirementToArg } from './requirement.js';
import type { LocalRequirement, Requirement, RequirementSpecData } from '../types.js';

export interface RequirementSpecInit {
  requirements?: readonly Requirement[];
  registry?: string | null;
  searchPaths?: readonly string[];
}

/**
 * The build-time requirements declared by a project's build script: package
 * specifiers in declaration order, an optional alternate registry and the
 * module search paths to add when the build script runs.
 */
export class RequirementSpec {
  readonly requirements: readonly Requirement[];
  readonly registry: string | null;
  readonly searchPaths: readonly string[];

  constructor(init: RequirementSpecInit = {}) {
    this.requirements = Object.freeze((init.requirements ?? []).map((r) => Object.freeze({ ...r })));
    this.registry = init.registry ?? null;
    this.searchPaths = Object.freeze([...(init.searchPaths ?? [])]);
    Object.freeze(this);
  }

  /**
   * Rebuild a spec from its serialized form.
   * @throws {Error} if a stored requirement token is not a valid specifier
   */
  static fromJSON(data: RequirementSpecData): RequirementSpec {
    const requirements = data.requirements.map((token) => {
      const requirement = parseRequirement(token);
      if (!requirement) throw new Error(`invalid requirement "${token}"`);
      return requirement;
    });
    return new RequirementSpec({ requirements, registry: data.registry, searchPaths: data.searchPaths });
  }

  toJSON(): RequirementSpecData {
    return {
      requirements: this.requirements.map(formatRequirement),
      registry: this.registry,
      searchPaths: [...this.searchPaths],
    };
  }

  /** sha256 over the canonical serialized form. Equal specs yield equal fingerprints. */
  fingerprint(): string {
    return crypto.createHash('sha256').update(JSON.stringify(this.toJSON())).digest('hex');
  }

  /**
   * Return a copy with `implied` requirements placed first. An implied
   * requirement is dropped when the spec already names the same package.
   */
  withImpliedRequirements(implied: readonly Requirement[]): RequirementSpec {
    const declared = new Set(this.requirements.map((r) => r.name));
    return new RequirementSpec({
      requirements: [...implied.filter((r) => !declared.has(r.name)), ...this.requirements],
      registry: this.registry,
      searchPaths: this.searchPaths,
    });
  }

  localRequirements(): LocalRequirement[] {
    return this.requirements.filter((r): r is LocalRequirement => r.kind === 'local');
  }

  /** Arguments for the package installer: registry flag first, then one specifier per requirement. */
  toArgs(projectDir: string): string[] {
    const args = this.registry === null ? [] : ['--registry', this.registry];
    return [...args, ...this.requirements.map((r) => requirementToArg(r, projectDir))];
  }

  resolveSearchPaths(projectDir: string): string[] {
    return this.searchPaths.map((p) => path.resolve(projectDir, p));
  }
}
