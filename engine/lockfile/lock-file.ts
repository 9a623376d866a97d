// engine/lockfile/lock-file.ts — Lock file document: schema, construction and serialization

import { z } from 'zod';
import { VERSION } from '../config.js';
import { IncompatibleLockFormatError } from '../errors.js';
import { parseRequirement, requirementToArg } from '../requirements/requirement.js';
import type { RequirementSpec } from '../requirements/spec.js';

export const LOCK_SCHEMA_VERSION = 1;

const LockMetadataSchema = z.object({
  createdAt: z.string(),
  nodeVersion: z.string(),
  platform: z.string(),
  cliVersion: z.string(),
});

export const LockFileSchema = z.object({
  schema: z.literal(LOCK_SCHEMA_VERSION),
  metadata: LockMetadataSchema,
  requirements: z.object({
    requirements: z.array(z.string()),
    registry: z.string().nullable(),
    searchPaths: z.array(z.string()),
  }),
  fingerprint: z.string().regex(/^[0-9a-f]{64}$/, 'expected a sha256 hex digest'),
  pinned: z.record(z.string()),
});

export type LockMetadata = z.infer<typeof LockMetadataSchema>;
export type LockFile = z.infer<typeof LockFileSchema>;

export function createLockMetadata(now: Date = new Date()): LockMetadata {
  return {
    createdAt: now.toISOString(),
    nodeVersion: process.version,
    platform: `${process.platform}-${process.arch}`,
    cliVersion: VERSION,
  };
}

export function createLockFile(
  spec: RequirementSpec,
  pinned: Readonly<Record<string, string>>,
  metadata: LockMetadata = createLockMetadata(),
): LockFile {
  return {
    schema: LOCK_SCHEMA_VERSION,
    metadata,
    requirements: spec.toJSON(),
    fingerprint: spec.fingerprint(),
    pinned: { ...pinned },
  };
}

function sortKeys(record: Readonly<Record<string, string>>): Record<string, string> {
  const sorted: Record<string, string> = {};
  for (const key of Object.keys(record).sort()) {
    sorted[key] = record[key];
  }
  return sorted;
}

/** Serialize with a fixed key order and sorted pins so diffs stay minimal. */
export function serializeLockFile(lock: LockFile): string {
  const ordered: LockFile = {
    schema: lock.schema,
    metadata: {
      createdAt: lock.metadata.createdAt,
      nodeVersion: lock.metadata.nodeVersion,
      platform: lock.metadata.platform,
      cliVersion: lock.metadata.cliVersion,
    },
    requirements: {
      requirements: [...lock.requirements.requirements],
      registry: lock.requirements.registry,
      searchPaths: [...lock.requirements.searchPaths],
    },
    fingerprint: lock.fingerprint,
    pinned: sortKeys(lock.pinned),
  };
  return `${JSON.stringify(ordered, null, 2)}\n`;
}

/**
 * Parse a lock document.
 *
 * @throws {IncompatibleLockFormatError} on invalid JSON, an unknown schema
 *   version or a document that does not match the schema
 */
export function parseLockFile(text: string, lockPath: string): LockFile {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new IncompatibleLockFormatError(lockPath, 'not valid JSON', { cause: err });
  }

  const version = z.object({ schema: z.unknown() }).safeParse(raw);
  if (!version.success) {
    throw new IncompatibleLockFormatError(lockPath, 'not a lock document');
  }
  if (version.data.schema !== LOCK_SCHEMA_VERSION) {
    throw new IncompatibleLockFormatError(
      lockPath,
      `unsupported lock format version ${JSON.stringify(version.data.schema) ?? 'undefined'} (expected ${LOCK_SCHEMA_VERSION})`,
    );
  }

  const parsed = LockFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new IncompatibleLockFormatError(lockPath, `${issue.path.join('.')}: ${issue.message}`);
  }
  return parsed.data;
}

/**
 * Installer arguments that reproduce the locked environment: the registry
 * flag, `name@version` for every pinned package, and the original path
 * specifier for local requirements, whose pinned version means nothing to a
 * registry.
 */
export function lockToArgs(lock: LockFile, projectDir: string): string[] {
  const args = lock.requirements.registry === null ? [] : ['--registry', lock.requirements.registry];
  const local = new Map<string, string>();
  for (const token of lock.requirements.requirements) {
    const requirement = parseRequirement(token);
    if (requirement?.kind === 'local') {
      local.set(requirement.name, requirementToArg(requirement, projectDir));
    }
  }

  for (const [name, version] of Object.entries(sortKeys(lock.pinned))) {
    args.push(local.get(name) ?? `${name}@${version}`);
  }
  for (const [name, arg] of local) {
    if (!(name in lock.pinned)) args.push(arg);
  }
  return args;
}
