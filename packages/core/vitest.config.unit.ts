import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    name: 'core-unit',
    include: ['tests/unit/**/*.test.ts'],
    environment: 'node',
    globals: true,
    setupFiles: ['tests/shared/setup-unit.ts'],
    testTimeout: 10000, // 10 seconds max per unit test
    hookTimeout: 5000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['tests/**'],
    },
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: false,
        minForks: 1,
        maxForks: 4,
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
