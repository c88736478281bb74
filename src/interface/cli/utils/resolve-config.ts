/**
 * Runtime config resolution for CLI commands:
 * config file < defaults, command-line flags win over both.
 */

import * as path from 'node:path';
import { InvalidArgumentError } from 'commander';
import { loadConfig } from '../../../config/config.js';
import type { DebounceConfig } from '../../../config/types.js';
import { configureLogger, type LogLevel } from '../../../shared/logger.js';
import { configureColors } from '../output/formatter.js';
import type { GlobalOptions } from './global-options.js';

export function resolveLogLevel(globals: GlobalOptions, configured: LogLevel): LogLevel {
  if (globals.quiet) return 'error';
  if (globals.verbose) return 'debug';
  return configured;
}

/**
 * Load the config for `globals.cwd` and set up logging and colors from it.
 */
export function resolveRuntimeConfig(globals: GlobalOptions): DebounceConfig {
  const config = loadConfig(globals.cwd);
  const logFile = globals.logFile ?? config.log.file;

  configureColors(!globals.noColor);
  configureLogger({
    level: resolveLogLevel(globals, config.log.level),
    file: logFile ? path.resolve(globals.cwd, logFile) : null,
  });

  return config;
}

/** commander argument parser for `--timeout <ms>` */
export function parseTimeout(value: string): number {
  const ms = Number(value);
  if (value.trim() === '' || !Number.isFinite(ms) || ms < 0) {
    throw new InvalidArgumentError('Expected a non-negative number of milliseconds.');
  }
  return ms;
}
