#!/usr/bin/env npx tsx
/**
 * Roster conversion CLI.
 *
 * Usage:
 *   npm run convert -- roster.pdf --out roster.ics
 *   npm run convert -- roster.txt --cutoff 2024-03-01 --timezone Europe/Warsaw
 */

import { nodeIo, runConvertCli } from '../src/cli.js';

// stdout may carry the calendar; info logs would end up inside it
process.env.APP_LOG_LEVEL ??= 'warn';

runConvertCli(process.argv.slice(2), nodeIo)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
