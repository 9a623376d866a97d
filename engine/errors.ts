// engine/errors.ts — Error taxonomy for build-environment management

import type { RequirementDiagnostic } from './types.js';

export type BuildEnvErrorCode =
  | 'MALFORMED_REQUIREMENT_SPEC'
  | 'INCOMPATIBLE_LOCK_FORMAT'
  | 'INSTALLATION_FAILURE'
  | 'ENVIRONMENT_MISSING_FOR_LOCK_ONLY'
  | 'MANAGED_ENVIRONMENT'
  | 'BUILD_SCRIPT_NOT_FOUND'
  | 'INVALID_CONFIG'
  | 'ENGINE_LOAD_FAILURE'
  | 'DISPATCH_FAILURE';

/**
 * Base class for every failure the environment manager reports to the user.
 * `exitCode` is the status the CLI terminates with when the error escapes.
 */
export class BuildEnvError extends Error {
  readonly code: BuildEnvErrorCode;
  readonly context: Record<string, unknown>;
  readonly exitCode: number = 1;

  constructor(
    code: BuildEnvErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'BuildEnvError';
    this.code = code;
    this.context = context;
  }
}

/**
 * Raised when a directive in the leading comment block cannot be tokenized
 * or names something that is not a valid requirement. Always raised before
 * the environment is touched.
 */
export class MalformedRequirementSpecError extends BuildEnvError {
  readonly diagnostics: readonly RequirementDiagnostic[];

  constructor(source: string, diagnostics: readonly RequirementDiagnostic[]) {
    const first = diagnostics[0];
    const summary = first ? `${first.source}:${first.line}: ${first.message}` : source;
    super(
      'MALFORMED_REQUIREMENT_SPEC',
      `Malformed requirement directive in ${source} (${summary})`,
      { source, count: diagnostics.length },
    );
    this.name = 'MalformedRequirementSpecError';
    this.diagnostics = diagnostics;
  }
}

export class IncompatibleLockFormatError extends BuildEnvError {
  readonly lockPath: string;

  constructor(lockPath: string, reason: string, options?: { cause?: unknown }) {
    super('INCOMPATIBLE_LOCK_FORMAT', `Cannot read lock file ${lockPath}: ${reason}`, { lockPath }, options);
    this.name = 'IncompatibleLockFormatError';
    this.lockPath = lockPath;
  }
}

export class InstallationFailureError extends BuildEnvError {
  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super('INSTALLATION_FAILURE', message, context, options);
    this.name = 'InstallationFailureError';
  }
}

/**
 * Raised by a lock-only install when there is no environment for the current
 * requirements: none is installed, or the installed one was built from a
 * different requirement spec and its packages would not match the lock.
 */
export class EnvironmentMissingForLockOnlyError extends BuildEnvError {
  constructor(environmentPath: string, installedFingerprint: string | null = null) {
    const problem =
      installedFingerprint === null
        ? `no build environment exists at ${environmentPath}`
        : `the build environment at ${environmentPath} was installed for different requirements`;
    super(
      'ENVIRONMENT_MISSING_FOR_LOCK_ONLY',
      `Cannot write lock file: ${problem}. Run \`kraken env install\` first.`,
      { environmentPath, installedFingerprint },
    );
    this.name = 'EnvironmentMissingForLockOnlyError';
  }
}

export class ManagedEnvironmentError extends BuildEnvError {
  constructor(operation: string) {
    super(
      'MANAGED_ENVIRONMENT',
      `\`kraken env ${operation}\` cannot be used inside the managed build environment (KRAKEN_MANAGED=1)`,
      { operation },
    );
    this.name = 'ManagedEnvironmentError';
  }
}

export class BuildScriptNotFoundError extends BuildEnvError {
  constructor(projectDir: string, candidates: readonly string[]) {
    super(
      'BUILD_SCRIPT_NOT_FOUND',
      `No build script found in ${projectDir} (looked for ${candidates.join(', ')})`,
      { projectDir, candidates: [...candidates] },
    );
    this.name = 'BuildScriptNotFoundError';
  }
}

export class InvalidConfigError extends BuildEnvError {
  constructor(issues: readonly string[]) {
    super('INVALID_CONFIG', `Invalid configuration:\n${issues.join('\n')}`, { issues: [...issues] });
    this.name = 'InvalidConfigError';
  }
}

export class EngineLoadError extends BuildEnvError {
  constructor(specifier: string, reason: string, options?: { cause?: unknown }) {
    super('ENGINE_LOAD_FAILURE', `Cannot load build engine "${specifier}": ${reason}`, { specifier }, options);
    this.name = 'EngineLoadError';
  }
}

export class DispatchFailureError extends BuildEnvError {
  constructor(command: string, reason: string, options?: { cause?: unknown }) {
    super('DISPATCH_FAILURE', `Cannot dispatch to build environment (${command}): ${reason}`, { command }, options);
    this.name = 'DispatchFailureError';
  }
}

// ─── Formatting ──────────────────────────────────────────────────────────────

/**
 * Render an error as a one-line headline followed by indented detail lines.
 * Diagnostics of a malformed requirement spec are listed one per line.
 */
export function formatError(err: unknown): string {
  if (err instanceof MalformedRequirementSpecError) {
    const details = err.diagnostics.map(
      (d) => `  ${d.source}:${d.line}: ${d.message}\n    ${d.text}`,
    );
    return [`Error: ${err.message}`, ...details].join('\n');
  }
  if (err instanceof BuildEnvError) {
    const cause = err.cause instanceof Error ? `\n  caused by: ${err.cause.message}` : '';
    return `Error: ${err.message}${cause}`;
  }
  if (err instanceof Error) {
    return `Error: ${err.message}`;
  }
  return `Error: ${String(err)}`;
}
