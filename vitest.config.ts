/**
 * Vitest Configuration for unit tests
 *
 * Usage:
 *   npm test
 */

import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const fromRoot = (relativePath: string): string =>
  fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['./tests/setup.ts'],
  },
  resolve: {
    alias: {
      '@/tests': fromRoot('./tests'),
      '@': fromRoot('./src'),
    },
  },
});
