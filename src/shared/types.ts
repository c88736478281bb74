/**
 * Shared types used across layers
 */

// --- Tasks ---

export type TaskState =
  | 'scheduled'
  | 'running'
  | 'completed'
  | 'cancelled'
  | 'failed';

export const TERMINAL_STATES: ReadonlySet<TaskState> = new Set<TaskState>([
  'completed',
  'cancelled',
  'failed',
]);

export type TaskOutcome =
  | { status: 'completed' }
  | { status: 'cancelled' }
  | { status: 'failed'; error: Error };

// --- Pipeline ---

export type StopReason = 'source-closed' | 'cancelled';

export interface DebounceSummary {
  /** Values taken from the source */
  accepted: number;
  /** Actions that ran to completion */
  executed: number;
  /** Tasks superseded or torn down before completing */
  cancelled: number;
  reason: StopReason;
}

// --- File events ---

export type FileChangeType = 'add' | 'change' | 'unlink';

export interface FileChangeEvent {
  type: FileChangeType;
  /** Path relative to the watch root, forward-slashed */
  filepath: string;
}
