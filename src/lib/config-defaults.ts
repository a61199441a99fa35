/**
 * Default configuration values for reposcope
 */

import type { ReposcopeConfig } from './config-types.js';

export const DEFAULT_IGNORE_DIRS = [
  'node_modules',
  'vendor',
  'dist',
  'build',
  'out',
  'target',
  'bin',
  'obj',
  '__pycache__',
  'venv',
  'env',
  'site-packages',
  'coverage',
];

export const DEFAULT_CONFIG: ReposcopeConfig = {
  sync: {
    interval_minutes: 5,
    concurrency: 4,
    git_timeout_ms: 120_000,
    strict_host_key_checking: false,
  },
  analysis: {
    max_dependencies: 50,
    file_concurrency: 8,
    max_file_size_kb: 512,
    ignore_dirs: DEFAULT_IGNORE_DIRS,
  },
  logging: {
    enabled: true,
    level: 'info',
    max_file_size_mb: 10,
  },
  ssh: {},
  repositories: [],
};
