/**
 * debounce-latest lines - Debounce lines read from stdin
 */

import { Command } from 'commander';
import { debounceLatest } from '../../../core/debounce/debounce-latest.js';
import { readLines } from '../../../core/source/read-lines.js';
import { createLogger } from '../../../shared/logger.js';
import type { DebounceSummary } from '../../../shared/types.js';
import { resolveGlobalOptions, type GlobalOptions } from '../utils/global-options.js';
import { parseTimeout, resolveRuntimeConfig } from '../utils/resolve-config.js';
import { handleCommandError } from '../output/error-display.js';
import { printJson, printJsonLine } from '../output/json-output.js';
import { formatBold, formatDim } from '../output/formatter.js';
import { onShutdownSignal } from '../utils/shutdown.js';

interface LinesOptions {
  timeout?: number;
  skipBlank?: boolean;
}

export function writeLatestLine(line: string, sequence: number, globals: GlobalOptions): void {
  if (globals.json) {
    printJsonLine({ sequence, line });
  } else {
    process.stdout.write(line + '\n');
  }
}

export function renderSummary(summary: DebounceSummary, globals: GlobalOptions): void {
  if (globals.json) {
    printJson({ summary });
    return;
  }
  if (globals.quiet) return;
  process.stderr.write(
    formatDim(
      `${formatBold(String(summary.accepted))} received, ` +
        `${summary.executed} emitted, ${summary.cancelled} superseded (${summary.reason})`,
    ) + '\n',
  );
}

export function linesCommand(): Command {
  return new Command('lines')
    .description('Print a stdin line once no newer line arrives within the timeout')
    .option('-t, --timeout <ms>', 'Quiet window in milliseconds', parseTimeout)
    .option('--skip-blank', 'Ignore blank lines', false)
    .action(async (options: LinesOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const config = resolveRuntimeConfig(globals);
        const timeoutMs = options.timeout ?? config.timeout_ms;
        const controller = new AbortController();
        const removeSignalHandlers = onShutdownSignal(() => controller.abort());

        try {
          const summary = await debounceLatest(
            readLines(process.stdin, {
              skipBlank: options.skipBlank ?? false,
              signal: controller.signal,
            }),
            timeoutMs,
            (line, context) => writeLatestLine(line, context.sequence, globals),
            { signal: controller.signal, logger: createLogger('lines') },
          );
          renderSummary(summary, globals);
        } finally {
          removeSignalHandlers();
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
