import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (relativePath: string): string =>
  fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Map package imports to source files for testing
      'auth-orchestrator/core': fromRoot('./src/core/index.ts'),
      'auth-orchestrator': fromRoot('./src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: ['src/**/*.ts', 'packages/*/src/**/*.ts'],
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/*.d.ts',
        'tests/**',

        // Entry points (mostly imports/exports - no logic to test)
        'src/index.ts',
        'src/core/index.ts',
        'src/config/index.ts',
        'src/providers/index.ts',
        'packages/*/src/index.ts',

        // Type-only files
        'src/core/types.ts',

        // Testing utilities (used by tests, not production code)
        'src/testing/**',
      ],
      thresholds: {
        statements: 80,
        branches: 75,
        functions: 80,
        lines: 80,
      },
    },
  },
});
