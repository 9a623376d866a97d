// engine/environment/environment-store.ts — On-disk build environment directory and its marker
//
// Layout:
//   <env>/package.json          written by the package installer
//   <env>/node_modules/...      installed requirements
//   <env>/.kraken-env.json      marker, written only after a complete install
//
// An environment without a valid marker is treated as absent.

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { createLogger } from '../logger.js';
import { atomicWriteFileSync } from '../utils/atomic-write.js';
import type { EnvironmentDescriptor, EnvironmentMarker } from '../types.js';

const log = createLogger('environment-store');

export const MARKER_FILE_NAME = '.kraken-env.json';

const EnvironmentMarkerSchema = z.object({
  fingerprint: z.string().min(1),
  createdAt: z.string(),
  cliVersion: z.string(),
});

export interface EnvironmentStore {
  readonly path: string;
  /** True if the directory exists, installed or not. */
  exists(): boolean;
  /** The marker of a completely installed environment, or null. */
  readMarker(): EnvironmentMarker | null;
  writeMarker(marker: EnvironmentMarker): void;
  clearMarker(): void;
  create(): void;
  /** Returns true if anything was removed. Never fails when nothing exists. */
  delete(): boolean;
  /** Path of an executable installed into the environment. */
  binPath(name: string): string;
}

export class FileEnvironmentStore implements EnvironmentStore {
  readonly path: string;

  constructor(environmentDir: string) {
    this.path = environmentDir;
  }

  exists(): boolean {
    return fs.existsSync(this.path);
  }

  readMarker(): EnvironmentMarker | null {
    const markerPath = this.markerPath();
    if (!fs.existsSync(markerPath)) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(markerPath, 'utf-8'));
    } catch (err) {
      log.warn(`ignoring unreadable environment marker ${markerPath}: ${String(err)}`);
      return null;
    }
    const parsed = EnvironmentMarkerSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn(`ignoring invalid environment marker ${markerPath}`);
      return null;
    }
    return parsed.data;
  }

  writeMarker(marker: EnvironmentMarker): void {
    atomicWriteFileSync(this.markerPath(), `${JSON.stringify(marker, null, 2)}\n`);
  }

  clearMarker(): void {
    fs.rmSync(this.markerPath(), { force: true });
  }

  create(): void {
    fs.mkdirSync(this.path, { recursive: true });
  }

  delete(): boolean {
    if (!fs.existsSync(this.path)) return false;
    fs.rmSync(this.path, { recursive: true, force: true });
    return true;
  }

  binPath(name: string): string {
    return path.join(this.path, 'node_modules', '.bin', name);
  }

  private markerPath(): string {
    return path.join(this.path, MARKER_FILE_NAME);
  }
}

export function describeEnvironment(store: EnvironmentStore, managed: boolean): EnvironmentDescriptor {
  return {
    path: store.path,
    fingerprint: store.readMarker()?.fingerprint ?? null,
    managed,
  };
}
