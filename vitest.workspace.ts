import { defineWorkspace } from 'vitest/config';

/**
 * Vitest workspace configuration for the tabletrace monorepo.
 * This enables running tests across all packages with a single command.
 */
export default defineWorkspace([
  // Core package
  {
    extends: './vitest.config.ts',
    test: {
      name: 'tabletrace-core',
      root: './packages/core',
      include: ['src/**/*.{test,spec}.ts'],
    },
  },

  // Detectors package
  {
    extends: './vitest.config.ts',
    test: {
      name: 'tabletrace-detectors',
      root: './packages/detectors',
      include: ['src/**/*.{test,spec}.ts'],
    },
  },

  // CLI package
  {
    extends: './vitest.config.ts',
    test: {
      name: 'tabletrace-cli',
      root: './packages/cli',
      include: ['src/**/*.{test,spec}.ts'],
    },
  },
]);
