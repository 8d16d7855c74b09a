/**
 * Vitest configuration for the ascii-banner CLI.
 *
 * All Ink renders are unmounted after each test via test/setup.ts, so no
 * React tree or spinner timer outlives its test.
 *
 * @module
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    // Auto-cleanup Ink renders after each test to prevent memory leaks
    setupFiles: ['./test/setup.ts'],
    include: [
      'test/**/*.test.{ts,tsx}',
    ],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov', 'clover'],
      include: ['src/**/*.{ts,tsx}'],
      exclude: [
        'src/test-utils/**',
        '**/node_modules/**',
        // Type-only files (no runtime code)
        'src/commands/types.ts',
        // Barrel re-export files (no logic)
        'src/ui/components/index.ts',
        'src/ui/hooks/index.ts',
        // CLI entry point
        'src/main.ts',
      ],
      reportsDirectory: './coverage',
      thresholds: {
        lines: 65,
        functions: 65,
        branches: 55,
        statements: 55
      }
    },
    testTimeout: 30000,
    // Forks keep process.exitCode and stdout spies isolated per file
    pool: 'forks',
  },
});
