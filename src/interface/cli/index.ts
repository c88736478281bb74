/**
 * CLI entry point - creates the commander.js program with all commands
 */

import { Command } from 'commander';
import { addGlobalOptions } from './utils/global-options.js';
import { linesCommand } from './commands/lines.js';
import { watchCommand } from './commands/watch.js';
import { initCommand } from './commands/init.js';
import { versionCommand } from './commands/version.js';
import { getVersion } from './version.js';

export function createCli(): Command {
  const program = new Command('debounce-latest')
    .description('Latest-wins debounce for stdin lines and file changes')
    .version(getVersion(), '-V, --version');

  addGlobalOptions(program);

  program.addCommand(linesCommand());
  program.addCommand(watchCommand());
  program.addCommand(initCommand());
  program.addCommand(versionCommand());

  return program;
}
