/**
 * debounce-latest init - Write a default config file
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { configExists, resolveConfigPath, saveConfig } from '../../../config/config.js';
import { DEFAULT_CONFIG } from '../../../config/defaults.js';
import { printJson } from '../output/json-output.js';
import { exitWithError, handleCommandError } from '../output/error-display.js';
import { formatSuccess, formatBold } from '../output/formatter.js';

interface InitOptions {
  force?: boolean;
}

export function initCommand(): Command {
  return new Command('init')
    .description('Write a default debounce-latest.config.json')
    .option('-f, --force', 'Overwrite an existing config file', false)
    .action((options: InitOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      const configPath = resolveConfigPath(globals.cwd);

      if (configExists(globals.cwd) && !options.force) {
        exitWithError(
          {
            message: `Config already exists: ${configPath}`,
            hint: 'Pass --force to overwrite it.',
          },
          globals,
        );
      }

      try {
        saveConfig(globals.cwd, DEFAULT_CONFIG);

        if (globals.json) {
          printJson({ path: configPath, config: DEFAULT_CONFIG });
        } else if (!globals.quiet) {
          process.stderr.write(formatSuccess('Config written') + '\n');
          process.stderr.write(`  ${formatBold('Path:')}    ${configPath}\n`);
          process.stderr.write(`  ${formatBold('Timeout:')} ${DEFAULT_CONFIG.timeout_ms}ms\n`);
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
