// engine/dispatch/reexec.ts — Run the command again inside the build environment

import { spawn } from 'node:child_process';
import type { SpawnOptions } from 'node:child_process';
import * as os from 'os';
import { DispatchFailureError } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('reexec');

export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

const SIGNAL_NUMBERS: ReadonlyMap<string, number> = new Map(Object.entries(os.constants.signals));

/** The parts of a ChildProcess the re-exec relies on. */
export interface ChildHandle {
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: 'error', listener: (err: Error) => void): unknown;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildHandle;

export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface ReexecOptions {
  command: string;
  args: readonly string[];
  cwd: string;
  env: Readonly<Record<string, string | undefined>>;
  spawn?: SpawnFn;
  signals?: SignalSource;
}

/**
 * Exit status for a finished child: its exit code, or 128 + the signal
 * number when it was killed by a signal.
 */
export function exitStatus(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal !== null) return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
  return 1;
}

/**
 * Spawn `command` with inherited stdio and wait for it. Termination signals
 * received meanwhile are forwarded to the child, which decides how to shut
 * down; the returned promise still resolves with the child's own status.
 *
 * @throws {DispatchFailureError} if the child cannot be started
 */
export function reexec(options: ReexecOptions): Promise<number> {
  const spawnFn: SpawnFn = options.spawn ?? spawn;
  const signals: SignalSource = options.signals ?? process;

  return new Promise((resolve, reject) => {
    const child = spawnFn(options.command, options.args, {
      cwd: options.cwd,
      env: { ...options.env },
      stdio: 'inherit',
    });

    const forward = (signal: NodeJS.Signals): void => {
      log.debug(`forwarding ${signal} to ${options.command}`);
      child.kill(signal);
    };
    for (const signal of FORWARDED_SIGNALS) signals.on(signal, forward);
    const detach = (): void => {
      for (const signal of FORWARDED_SIGNALS) signals.off(signal, forward);
    };

    child.once('error', (err) => {
      detach();
      reject(new DispatchFailureError(options.command, err.message, { cause: err }));
    });
    child.once('exit', (code, signal) => {
      detach();
      resolve(exitStatus(code, signal));
    });
  });
}
