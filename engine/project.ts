// engine/project.ts — Locate the project's requirement source and read its spec

import * as fs from 'fs';
import * as path from 'path';
import { VERSION } from './config.js';
import { BuildScriptNotFoundError, MalformedRequirementSpecError } from './errors.js';
import { extractRequirements } from './requirements/extractor.js';
import { getImpliedRequirements } from './requirements/implied.js';
import type { RequirementSpec } from './requirements/spec.js';
import type { BuildEnvConfig } from './types.js';

export const REQUEST_FILE_NAME = 'kraken.req';
export const BUILD_SCRIPT_NAMES = ['.kraken.ts', '.kraken.mts', '.kraken.js', '.kraken.mjs'];

/**
 * Find the file whose header declares the build requirements: the request
 * file when present, otherwise the first build script found.
 *
 * @throws {BuildScriptNotFoundError} if neither exists
 */
export function findRequirementSource(projectDir: string): string {
  for (const name of [REQUEST_FILE_NAME, ...BUILD_SCRIPT_NAMES]) {
    const candidate = path.join(projectDir, name);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
  }
  throw new BuildScriptNotFoundError(projectDir, [REQUEST_FILE_NAME, ...BUILD_SCRIPT_NAMES]);
}

/**
 * Read the root project's requirement spec, with the implied CLI requirement
 * prepended. Scripts of sub-projects are never consulted.
 *
 * @throws {MalformedRequirementSpecError} on any directive diagnostic
 */
export function readRequirementSpec(
  config: Pick<BuildEnvConfig, 'projectDir' | 'develop' | 'localPackageRoot'>,
): RequirementSpec {
  const source = findRequirementSource(config.projectDir);
  const text = fs.readFileSync(source, 'utf-8');
  const name = path.relative(config.projectDir, source);
  const { spec, diagnostics } = extractRequirements(text, name);

  if (spec === null) {
    throw new MalformedRequirementSpecError(name, diagnostics);
  }

  return spec.withImpliedRequirements(
    getImpliedRequirements({
      develop: config.develop,
      version: VERSION,
      localPackageRoot: config.localPackageRoot,
    }),
  );
}
