// engine/dispatch/build-engine.ts — Boundary to the build-graph engine that runs the build script

import * as path from 'path';
import { z } from 'zod';
import { EngineLoadError } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('build-engine');

export interface BuildRequest {
  projectDir: string;
  buildDir: string;
  /** The command line as given to `kraken`, without the executable. */
  args: readonly string[];
  /** Absolute directories to add to the module search path of the build script. */
  searchPaths: readonly string[];
}

export interface BuildGraphEngine {
  /** Load and execute the build script; resolves with the process exit status. */
  run(request: BuildRequest): Promise<number>;
}

/** Prepend `paths` to a NODE_PATH-style list, dropping duplicates. */
export function prependSearchPaths(current: string | undefined, paths: readonly string[]): string {
  const existing = (current ?? '').split(path.delimiter).filter((p) => p !== '');
  return [...new Set([...paths, ...existing])].join(path.delimiter);
}

const EngineModuleSchema = z.object({
  run: z.function().args(z.custom<BuildRequest>()).returns(z.unknown()),
});

const ExitStatusSchema = z.number().int().min(0).optional();

export type ModuleImporter = (specifier: string) => Promise<unknown>;

/**
 * Engine implemented by a module exporting `run(request)`, loaded from the
 * environment this process runs in. `run` may return an exit status or
 * nothing (treated as success).
 */
export class ModuleBuildEngine implements BuildGraphEngine {
  constructor(
    private readonly specifier: string,
    private readonly env: Record<string, string | undefined>,
    private readonly importer: ModuleImporter = (specifier) => import(specifier),
  ) {}

  async run(request: BuildRequest): Promise<number> {
    if (request.searchPaths.length > 0) {
      // Only processes spawned from here on read NODE_PATH; this process resolves through request.searchPaths.
      this.env.NODE_PATH = prependSearchPaths(this.env.NODE_PATH, request.searchPaths);
      log.debug(`NODE_PATH=${this.env.NODE_PATH}`);
    }

    let loaded: unknown;
    try {
      loaded = await this.importer(this.specifier);
    } catch (err) {
      throw new EngineLoadError(this.specifier, err instanceof Error ? err.message : String(err), { cause: err });
    }

    const engine = EngineModuleSchema.safeParse(loaded);
    if (!engine.success) {
      throw new EngineLoadError(this.specifier, 'module does not export a run() function');
    }

    const status = ExitStatusSchema.safeParse(await engine.data.run(request));
    if (!status.success) {
      throw new EngineLoadError(this.specifier, 'run() returned something other than an exit status');
    }
    return status.data ?? 0;
  }
}
