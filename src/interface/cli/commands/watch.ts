/**
 * debounce-latest watch - Re-run a command once file changes settle
 */

import { Command } from 'commander';
import { debounceLatest } from '../../../core/debounce/debounce-latest.js';
import { watchFiles } from '../../../core/source/file-events.js';
import { createLogger } from '../../../shared/logger.js';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { parseTimeout, resolveRuntimeConfig } from '../utils/resolve-config.js';
import { onShutdownSignal } from '../utils/shutdown.js';
import { exitWithError, handleCommandError } from '../output/error-display.js';
import { renderSummary } from './lines.js';
import { createExecAction } from '../actions/exec-action.js';

interface WatchOptions {
  exec?: string;
  timeout?: number;
  exclude?: string[];
  keepGoing?: boolean;
}

export function watchCommand(): Command {
  return new Command('watch')
    .description('Run a command after file changes settle; a newer change kills a running command')
    .argument('[patterns...]', 'Glob patterns to watch, relative to --cwd')
    .option('-e, --exec <command>', 'Shell command to run')
    .option('-t, --timeout <ms>', 'Quiet window in milliseconds', parseTimeout)
    .option('--exclude <patterns...>', 'Exclude patterns')
    .option('--keep-going', 'Keep watching when the command exits non-zero')
    .action(async (patterns: string[], options: WatchOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const config = resolveRuntimeConfig(globals);
        const command = options.exec ?? config.watch.exec;
        if (!command) {
          exitWithError(
            {
              message: 'No command to run',
              hint: "Pass --exec '<command>' or set watch.exec in debounce-latest.config.json",
            },
            globals,
          );
        }

        const logger = createLogger('watch');
        const source = watchFiles({
          cwd: globals.cwd,
          include: patterns.length > 0 ? patterns : config.watch.include,
          exclude: options.exclude ?? config.watch.exclude,
          logger,
        });

        const controller = new AbortController();
        const removeSignalHandlers = onShutdownSignal(() => controller.abort());

        try {
          const pipeline = debounceLatest(
            source,
            options.timeout ?? config.timeout_ms,
            createExecAction({
              command,
              cwd: globals.cwd,
              keepGoing: options.keepGoing ?? config.watch.keep_going,
              logger,
            }),
            { signal: controller.signal, logger },
          );
          void source.ready.then(() => {
            logger.info(`Watching ${globals.cwd} (timeout ${options.timeout ?? config.timeout_ms}ms)`);
          });

          const summary = await pipeline;
          renderSummary(summary, globals);
        } finally {
          removeSignalHandlers();
          await source.close();
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
