import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const root = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@shared/schema': `${root}packages/shared/schema/index.ts`,
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'lcov'],
      include: ['server/**/*.ts', 'packages/shared/**/*.ts', 'scripts/**/*.ts'],
      exclude: [
        '**/node_modules/**',
        '**/*.test.ts',
        '**/dist/**',
        // Pure interface/type-alias files compile to empty JS — no executable code for v8
        '**/types.ts',
        // Entry points — exercised against real infrastructure only
        'server/db.ts',
        // Barrel re-export files — no logic, implicitly tested by underlying modules
        'server/services/media/index.ts',
        'packages/shared/schema/index.ts',
        // Test helpers — not production code
        'server/__tests__/helpers/**',
      ],
    },
    testTimeout: 10000,
  },
});
