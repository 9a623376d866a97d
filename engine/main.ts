#!/usr/bin/env node
// engine/main.ts — Executable entry point for kraken

import { runCli } from './cli.js';

runCli(process.argv.slice(2), { env: process.env, cwd: process.cwd() }).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  },
);
