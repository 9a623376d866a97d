// engine/logger.ts — winston logger shared by all components
//
// Every line goes to stderr so that the build's own stdout stays clean.
// Output format: `<level> | <component> | <message>`.

import winston from 'winston';
import type { LogLevel } from './types.js';

const ALL_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

const root = winston.createLogger({
  level: 'warn',
  format: winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.printf((info) => {
      const component = typeof info.component === 'string' ? info.component : 'kraken';
      return `${info.level.padEnd(7)} | ${component.padEnd(24)} | ${String(info.message)}`;
    }),
  ),
  transports: [new winston.transports.Console({ stderrLevels: ALL_LEVELS })],
});

export type Logger = winston.Logger;

export function setLogLevel(level: LogLevel): void {
  root.level = level;
}

export function createLogger(component: string): Logger {
  return root.child({ component });
}
