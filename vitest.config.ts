import os from 'os';
import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    testTimeout: 30000,
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    // Keep logs and databases of code under test out of the real ~/.reposcope
    env: {
      REPOSCOPE_HOME: path.join(os.tmpdir(), `reposcope-vitest-${process.pid}`),
    },
    // web-tree-sitter keeps its WASM instance per process; forks isolate it per file
    pool: 'forks',
  },
});
