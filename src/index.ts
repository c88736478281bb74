/**
 * Public API
 */

export {
  debounceLatest,
  assertValidTimeout,
  type DebounceLatestOptions,
  type ValueSource,
} from './core/debounce/debounce-latest.js';
export {
  PendingTask,
  type ActionContext,
  type DebounceAction,
  type PendingTaskOptions,
} from './core/debounce/pending-task.js';
export { LatestDebouncer, type LatestDebouncerOptions } from './core/debounce/latest-debouncer.js';
export { CancellationScope, type CancelListener } from './core/scheduler/cancellation-scope.js';
export { systemClock, type Clock, type TimerHandle } from './core/scheduler/clock.js';
export { delay } from './core/scheduler/delay.js';
export { Channel } from './core/source/channel.js';
export { readLines, type ReadLinesOptions } from './core/source/read-lines.js';
export { watchFiles, FileEventSource, type WatchFilesOptions } from './core/source/file-events.js';
export {
  configExists,
  loadConfig,
  parseConfig,
  resolveConfigPath,
  saveConfig,
  CONFIG_FILE,
} from './config/config.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
export type { DebounceConfig } from './config/types.js';
export {
  configureLogger,
  closeLogger,
  createLogger,
  silentLogger,
  type Logger,
  type LogLevel,
} from './shared/logger.js';
export {
  DebounceError,
  ConfigError,
  ConfigNotFoundError,
  InvalidTimeoutError,
  CancellationError,
  ActionFailedError,
  IllegalTaskStateError,
  ChannelClosedError,
  CommandFailedError,
  isCancellation,
} from './shared/errors.js';
export type {
  DebounceSummary,
  FileChangeEvent,
  FileChangeType,
  StopReason,
  TaskOutcome,
  TaskState,
} from './shared/types.js';
