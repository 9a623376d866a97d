// engine/types.ts — Core type definitions for the build-environment manager

// --- Configuration ---
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Process-wide settings, resolved once at start-up from the command line and
 * the environment. Components receive this struct and never read
 * `process.env` themselves.
 */
export interface BuildEnvConfig {
  projectDir: string;
  buildDir: string;
  /** `<buildDir>/.kraken/env` */
  environmentDir: string;
  lockPath: string;
  /** KRAKEN_MANAGED=1: this process already runs inside the build environment. */
  managed: boolean;
  /** KRAKEN_DEVELOP=1: install the CLI itself from `localPackageRoot`. */
  develop: boolean;
  /** KRAKEN_ALWAYS_UPDATE_LOCAL_REQUIREMENTS=1 */
  alwaysUpdateLocalRequirements: boolean;
  localPackageRoot: string;
  engineModule: string;
  npmCommand: string;
  logLevel: LogLevel;
}

// --- Requirements ---
export interface PublishedRequirement {
  kind: 'published';
  name: string;
  /** npm version range, or null for "any version". */
  range: string | null;
}

export interface LocalRequirement {
  kind: 'local';
  name: string;
  /** Filesystem path as written; relative paths resolve against the project directory. */
  path: string;
}

export type Requirement = PublishedRequirement | LocalRequirement;

/** Serialized form of a RequirementSpec, as stored in the lock file. */
export interface RequirementSpecData {
  requirements: string[];
  registry: string | null;
  searchPaths: string[];
}

export interface RequirementDiagnostic {
  code: 'MALFORMED_REQUIREMENT_SPEC';
  message: string;
  source: string;
  /** 1-based line number within the source file. */
  line: number;
  text: string;
}

// --- Environment ---
export interface EnvironmentMarker {
  fingerprint: string;
  createdAt: string;
  cliVersion: string;
}

export interface EnvironmentDescriptor {
  path: string;
  /** Fingerprint of the spec the environment was built from; null if not installed. */
  fingerprint: string | null;
  managed: boolean;
}

export type InstallMode = 'fresh' | 'upgrade' | 'lock-only';

// --- Dispatch ---
export type DispatchDecision = 'RUN_IN_PLACE' | 'INSTALL_THEN_RUN' | 'REEXEC_INTO_ENVIRONMENT';

export type ProbeReason = 'managed' | 'missing' | 'stale' | 'local-requirement-refresh' | 'fresh';

export interface ProbeResult {
  decision: DispatchDecision;
  reason: ProbeReason;
  detail: string;
}

export type DispatchState =
  | 'NotProbed'
  | 'Probed'
  | 'Installing'
  | 'Installed'
  | 'Failed'
  | 'Dispatched'
  | 'Terminal';

// --- Reporting ---

/** User-facing progress output, separate from diagnostic logging. */
export interface Reporter {
  info(message: string): void;
  warn(message: string): void;
}
