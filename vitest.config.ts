import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    watch: false,
    globals: true,
    setupFiles: ['tests/setup.ts'],
    reporters: ['default'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**'],
      thresholds: {
        100: false,
        lines: 95,
        functions: 95,
        branches: 90,
        statements: 95,
      },
    },
    // Golden renders run a full second of audio.
    testTimeout: 20000,
    hookTimeout: 2000,
    logHeapUsage: true,
  },
});
