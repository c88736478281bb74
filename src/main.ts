#!/usr/bin/env node

/**
 * debounce-latest CLI entry point
 */

import { createCli } from './interface/cli/index.js';
import { closeLogger } from './shared/logger.js';

const program = createCli();
program
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  })
  .finally(() => {
    closeLogger();
  });
