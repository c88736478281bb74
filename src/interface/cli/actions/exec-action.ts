/**
 * Shell command action for `watch`
 *
 * The child process is bound to the task's AbortSignal: a newer change
 * kills a run that is still in progress.
 */

import { spawn, type StdioOptions } from 'node:child_process';
import type { ActionContext, DebounceAction } from '../../../core/debounce/pending-task.js';
import { CancellationError, CommandFailedError } from '../../../shared/errors.js';
import type { Logger } from '../../../shared/logger.js';
import type { FileChangeEvent } from '../../../shared/types.js';
import { formatDuration } from '../output/formatter.js';

export interface CommandResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export interface RunCommandOptions {
  cwd: string;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
  stdio?: StdioOptions;
}

/**
 * Run `command` through the shell. Rejects with a cancellation error when
 * `signal` aborts; resolves with the exit status otherwise.
 */
export function runCommand(command: string, options: RunCommandOptions): Promise<CommandResult> {
  if (options.signal?.aborted) {
    return Promise.reject(new CancellationError('Command cancelled before start'));
  }

  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: options.stdio ?? 'inherit',
      shell: true,
      signal: options.signal,
      killSignal: 'SIGTERM',
    });

    child.once('error', (err) => reject(err));
    child.once('close', (exitCode, signal) => {
      if (options.signal?.aborted) {
        reject(new CancellationError('Command cancelled'));
        return;
      }
      resolve({ exitCode, signal });
    });
  });
}

export interface ExecActionOptions {
  command: string;
  cwd: string;
  keepGoing: boolean;
  logger: Logger;
  stdio?: StdioOptions;
}

/**
 * Build the action run for each settled file change. The changed file is
 * exposed to the command as DEBOUNCE_LATEST_FILE / DEBOUNCE_LATEST_EVENT.
 */
export function createExecAction(options: ExecActionOptions): DebounceAction<FileChangeEvent> {
  return async (event: FileChangeEvent, context: ActionContext) => {
    context.throwIfCancelled();
    options.logger.info(`Running: ${options.command} (${event.type} ${event.filepath})`);

    const startedAt = Date.now();
    const result = await runCommand(options.command, {
      cwd: options.cwd,
      signal: context.signal,
      stdio: options.stdio,
      env: {
        ...process.env,
        DEBOUNCE_LATEST_FILE: event.filepath,
        DEBOUNCE_LATEST_EVENT: event.type,
      },
    });

    if (result.exitCode === 0) {
      options.logger.info(`Finished in ${formatDuration(Date.now() - startedAt)}`);
      return;
    }

    const failure = new CommandFailedError(options.command, result.exitCode, result.signal);
    if (options.keepGoing) {
      options.logger.warn(failure.message);
      return;
    }
    throw failure;
  };
}
