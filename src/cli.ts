#!/usr/bin/env node

// taxograph CLI entry point

import { runCli } from './commands/cli.js';

process.exitCode = runCli(process.argv.slice(2), {
  out: (line) => process.stdout.write(line + '\n'),
  err: (line) => process.stderr.write(line + '\n'),
});
