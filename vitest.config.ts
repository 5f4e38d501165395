import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const packageEntry = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Workspace package aliases so tests run against sources without a build
      '@hubanon/privacy': packageEntry('privacy'),
      '@hubanon/activity': packageEntry('activity'),
      '@hubanon/cli': packageEntry('cli'),
    },
  },
  test: {
    root: '.',
    include: ['packages/*/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 10000,
    // Fail fast on first error in CI
    bail: process.env.CI ? 1 : 0,
  },
});
