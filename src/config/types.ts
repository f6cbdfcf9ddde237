/**
 * buildsense configuration types
 */

import type { LogLevel } from '../shared/logger.js';

export interface BuildSenseConfig {
  /** Task scheduler */
  scheduler: {
    /** null: one job per logical core */
    max_concurrent_jobs: number | null;
  };

  /** Quiet periods for change notifications */
  debounce: {
    build_settings_ms: number;
    source_files_ms: number;
  };

  /** Toolchain discovery */
  toolchains: {
    search_paths: string[];
    default: string | null;
    platform_defaults: boolean;
  };

  /** Flags used when no build system knows a file */
  fallback: {
    c_flags: string[];
    cxx_flags: string[];
  };

  /** File watcher */
  watcher: {
    exclude: string[];
  };

  log: {
    level: LogLevel;
    file: string | null;
  };
}

export const DEFAULT_CONFIG: BuildSenseConfig = {
  scheduler: {
    max_concurrent_jobs: null,
  },
  debounce: {
    build_settings_ms: 20,
    source_files_ms: 500,
  },
  toolchains: {
    search_paths: [],
    default: null,
    platform_defaults: true,
  },
  fallback: {
    c_flags: [],
    cxx_flags: [],
  },
  watcher: {
    exclude: ['node_modules', '.git', '.build', 'build'],
  },
  log: {
    level: 'info',
    file: null,
  },
};
