import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

/**
 * Shared Vitest configuration. Workspace packages resolve to their
 * TypeScript sources so tests never depend on a build.
 */
export default defineConfig({
  resolve: {
    alias: {
      'tabletrace-core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      'tabletrace-detectors': fileURLToPath(new URL('./packages/detectors/src/index.ts', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    testTimeout: 10_000,
  },
});
