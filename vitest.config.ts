import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import path from 'node:path';

const projectRoot = path.dirname(fileURLToPath(new URL(import.meta.url)));
const resolveFromRoot = (p: string) => path.join(projectRoot, p);

export default defineConfig({
  test: {
    include: [
      'packages/**/tests/unit/**/*.test.ts',
      'packages/**/tests/properties/**/*.property.ts',
    ],
    exclude: ['node_modules', 'dist', '**/node_modules/**', '**/dist/**'],
    environment: 'node',
    globals: false,
    clearMocks: true,
    restoreMocks: true,
    testTimeout: 5000,
    // Logger configuration is read when the module loads
    env: {
      LOG_CONSOLE: 'false',
      LOG_FILE: 'false',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: 'coverage',
      include: ['packages/**/src/**/*.ts'],
      exclude: ['packages/**/src/**/index.ts', 'packages/cli/src/bin/**'],
    },
  },
  resolve: {
    alias: {
      '@fractime/utils': resolveFromRoot('packages/utils/src/index.ts'),
      '@fractime/core': resolveFromRoot('packages/core/src/index.ts'),
    },
  },
});
