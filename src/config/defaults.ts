import type { DebounceConfig } from './types.js';

export const DEFAULT_CONFIG: DebounceConfig = {
  timeout_ms: 300,
  watch: {
    include: ['**/*'],
    exclude: ['**/node_modules/**', '**/.git/**', '**/dist/**'],
    exec: null,
    keep_going: false,
  },
  log: {
    level: 'info',
    file: null,
  },
};
