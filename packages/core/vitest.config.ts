import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    // Disable file watching by default
    watch: false,
    // Run test files one at a time; several tests write temp directories and spy on console
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    // PDF and DOCX rendering can be slow on a cold start
    testTimeout: 20000,
    hookTimeout: 10000,
    // Clear mocks between tests
    clearMocks: true,
    isolate: true,
    reporters: ['default'],
  },
});
