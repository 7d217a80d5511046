#!/usr/bin/env node
/**
 * CLI: replay, normalize and inspect macro workflows.
 *
 * Usage: npx tsx node-runtime/src/cli/macro-replay.ts run workflow_presets/login.json
 *
 * `run` streams JSONL progress events on stdout so a UI process can follow
 * the run; Ctrl+C stops the run between steps.
 */

import { getEnv } from '../config/env.js';
import { runCli } from './commands.js';

process.exitCode = await runCli(process.argv.slice(2), {
  out: (line) => {
    process.stdout.write(line + '\n');
  },
  err: (line) => {
    process.stderr.write(line + '\n');
  },
  env: getEnv,
  onInterrupt: (handler) => {
    process.on('SIGINT', handler);
    return () => {
      process.off('SIGINT', handler);
    };
  },
});
