#!/usr/bin/env node
/**
 * bytesniff CLI entry point
 */

import { runCli } from './cli-app.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
