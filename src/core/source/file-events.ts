/**
 * File change source using chokidar
 * Emits add/change/unlink events under a root directory as an AsyncIterable.
 */

import chokidar, { type FSWatcher } from 'chokidar';
import * as path from 'node:path';
import type { FileChangeEvent } from '../../shared/types.js';
import { createLogger, type Logger } from '../../shared/logger.js';
import { isWithinRoot, toRelativePath } from '../../shared/path-utils.js';
import { Channel } from './channel.js';

export interface WatchFilesOptions {
  /** Watch root; event paths are reported relative to it */
  cwd: string;
  include: string[];
  exclude: string[];
  logger?: Logger;
}

export class FileEventSource implements AsyncIterable<FileChangeEvent> {
  private readonly channel = new Channel<FileChangeEvent>();
  private readonly logger: Logger;
  private watcher: FSWatcher | null = null;
  private resolveReady: () => void = () => {};
  private readonly readyPromise: Promise<void>;

  constructor(private readonly options: WatchFilesOptions) {
    this.logger = options.logger ?? createLogger('FileWatcher');
    this.readyPromise = new Promise<void>((resolve) => {
      this.resolveReady = resolve;
    });
  }

  /** Resolves once the initial scan has finished; starts the watcher. */
  get ready(): Promise<void> {
    this.start();
    return this.readyPromise;
  }

  get isWatching(): boolean {
    return this.watcher !== null;
  }

  start(): void {
    if (this.watcher || this.channel.isClosed) return;

    const watchPatterns = this.options.include.map(
      (p) => path.join(this.options.cwd, p),
    );

    this.watcher = chokidar.watch(watchPatterns, {
      ignored: this.options.exclude,
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: 100,
        pollInterval: 50,
      },
    });

    this.watcher
      .on('add', (filePath) => this.handleEvent('add', filePath))
      .on('change', (filePath) => this.handleEvent('change', filePath))
      .on('unlink', (filePath) => this.handleEvent('unlink', filePath))
      .on('error', (error) => {
        this.logger.error('Watch error:', String(error));
      })
      .on('ready', () => {
        this.logger.debug('File watcher ready');
        this.resolveReady();
      });
  }

  async close(): Promise<void> {
    this.channel.close();
    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) {
      await watcher.close();
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<FileChangeEvent, undefined> {
    this.start();
    const events = this.channel[Symbol.asyncIterator]();
    return {
      next: () => events.next(),
      return: async () => {
        await this.close();
        return { value: undefined, done: true };
      },
    };
  }

  private handleEvent(type: FileChangeEvent['type'], absolutePath: string): void {
    const filepath = toRelativePath(absolutePath, this.options.cwd);

    if (!isWithinRoot(filepath)) {
      this.logger.warn(`Ignoring path outside watch root: ${filepath}`);
      return;
    }
    if (this.channel.isClosed) return;

    this.channel.send({ type, filepath });
  }
}

export function watchFiles(options: WatchFilesOptions): FileEventSource {
  return new FileEventSource(options);
}
