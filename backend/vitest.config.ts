import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  root: rootDir,
  test: {
    include: ['tests/**/*.spec.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],
    environment: 'node',
    globals: true,
    // The logger and realtime hub are module singletons; forks keep each file isolated.
    pool: 'forks',
    setupFiles: ['tests/setup.ts'],
    hookTimeout: 30_000,
    testTimeout: 30_000,
  },
});
