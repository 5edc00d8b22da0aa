#!/usr/bin/env node
/**
 * CLI entrypoint for mirroring a calendar
 *
 * Usage:
 *   npx tsx src/run.ts --source-calendar Work --days 7
 *   npx tsx src/run.ts --source-calendar Work --do-sync "Work Mirror" --exclude-declined-events
 */

import { runCli } from './cli.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
