import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    name: 'core-integration',
    include: ['tests/integration/**/*.integration.test.ts'],
    environment: 'node',
    globals: true,
    setupFiles: ['tests/shared/setup-integration.ts'],
    testTimeout: 60000, // generated sequences run thousands of queries
    hookTimeout: 30000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['tests/**'],
    },
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
        minForks: 1,
        maxForks: 2,
      },
    },
  },
  resolve: {
    alias: {
      '@phystate/shared': fileURLToPath(
        new URL('../shared/src/index.ts', import.meta.url)
      ),
      '@phystate/core': fileURLToPath(new URL('./src/index.ts', import.meta.url)),
    },
  },
});
