// engine/lockfile/lock-store.ts — Repository for the project's lock file

import * as fs from 'fs';
import { atomicWriteFileSync } from '../utils/atomic-write.js';
import { parseLockFile, serializeLockFile } from './lock-file.js';
import type { LockFile } from './lock-file.js';

/**
 * Load a lock file. Returns null when no file exists at `lockPath`.
 *
 * @throws {IncompatibleLockFormatError} if the file exists but cannot be understood
 */
export function loadLockFile(lockPath: string): LockFile | null {
  let text: string;
  try {
    text = fs.readFileSync(lockPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw err;
  }
  return parseLockFile(text, lockPath);
}

export function saveLockFile(lockPath: string, lock: LockFile): void {
  atomicWriteFileSync(lockPath, serializeLockFile(lock));
}

/**
 * Storage for a single lock file. The filesystem implementation is the only
 * one shipped; tests substitute an in-memory store.
 */
export interface LockStore {
  readonly path: string;
  load(): LockFile | null;
  save(lock: LockFile): void;
  exists(): boolean;
  /** Returns true if a file was removed. Never fails when nothing exists. */
  delete(): boolean;
}

export class FileLockStore implements LockStore {
  readonly path: string;

  constructor(lockPath: string) {
    this.path = lockPath;
  }

  load(): LockFile | null {
    return loadLockFile(this.path);
  }

  save(lock: LockFile): void {
    saveLockFile(this.path, lock);
  }

  exists(): boolean {
    return fs.existsSync(this.path);
  }

  delete(): boolean {
    if (!fs.existsSync(this.path)) return false;
    fs.rmSync(this.path, { force: true });
    return true;
  }
}
