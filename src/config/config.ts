/**
 * Configuration loading and validation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { DebounceConfig } from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { configFileSchema, type ConfigFile } from './schema.js';
import { ConfigError, ConfigNotFoundError } from '../shared/errors.js';

export const CONFIG_FILE = 'debounce-latest.config.json';

/**
 * Resolve the config file path from a given working directory.
 */
export function resolveConfigPath(cwd: string): string {
  return path.join(cwd, CONFIG_FILE);
}

/**
 * Check if a config file exists.
 */
export function configExists(cwd: string): boolean {
  return fs.existsSync(resolveConfigPath(cwd));
}

/**
 * Load config from disk, merging with defaults. A missing file yields the
 * defaults unless `required` is set.
 */
export function loadConfig(cwd: string, options: { required?: boolean } = {}): DebounceConfig {
  const configPath = resolveConfigPath(cwd);

  if (!fs.existsSync(configPath)) {
    if (options.required) throw new ConfigNotFoundError(configPath);
    return mergeWithDefaults({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Failed to load config from ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
      err instanceof Error ? err : undefined,
    );
  }

  return parseConfig(raw, configPath);
}

/**
 * Validate an already-parsed config object and merge it with defaults.
 */
export function parseConfig(raw: unknown, source = CONFIG_FILE): DebounceConfig {
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigError(
      `Invalid config in ${source}: ${where}: ${issue ? issue.message : 'invalid value'}`,
    );
  }
  return mergeWithDefaults(result.data);
}

/**
 * Save config to disk.
 */
export function saveConfig(cwd: string, config: DebounceConfig): void {
  fs.mkdirSync(cwd, { recursive: true });
  fs.writeFileSync(resolveConfigPath(cwd), JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

/**
 * Merge a partial config with defaults.
 */
function mergeWithDefaults(partial: ConfigFile): DebounceConfig {
  return {
    timeout_ms: partial.timeout_ms ?? DEFAULT_CONFIG.timeout_ms,
    watch: {
      include: partial.watch?.include ?? [...DEFAULT_CONFIG.watch.include],
      exclude: partial.watch?.exclude ?? [...DEFAULT_CONFIG.watch.exclude],
      exec: partial.watch?.exec ?? DEFAULT_CONFIG.watch.exec,
      keep_going: partial.watch?.keep_going ?? DEFAULT_CONFIG.watch.keep_going,
    },
    log: {
      level: partial.log?.level ?? DEFAULT_CONFIG.log.level,
      file: partial.log?.file ?? DEFAULT_CONFIG.log.file,
    },
  };
}
