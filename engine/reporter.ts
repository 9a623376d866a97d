// engine/reporter.ts — Colored progress output on stderr

import chalk from 'chalk';
import type { Reporter } from './types.js';

export function createConsoleReporter(write: (text: string) => void = (text) => process.stderr.write(text)): Reporter {
  return {
    info: (message) => write(`${chalk.blue(message)}\n`),
    warn: (message) => write(`${chalk.yellow(`Warning: ${message}`)}\n`),
  };
}
