import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    watch: false,
    // Tests bind ports and write temp directories
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    testTimeout: 20000,
    hookTimeout: 10000,
    clearMocks: true,
    isolate: true,
    reporters: ['default'],
  },
});
