/**
 * Configuration types
 */

import type { LogLevel } from '../shared/logger.js';

export interface DebounceConfig {
  /** Quiet window before the latest value's action may run */
  timeout_ms: number;

  /** `watch` command settings */
  watch: {
    include: string[];
    exclude: string[];
    /** Shell command run after each quiet window */
    exec: string | null;
    /** Log non-zero exits instead of stopping */
    keep_going: boolean;
  };

  log: {
    level: LogLevel;
    file: string | null;
  };
}
