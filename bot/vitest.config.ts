import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    globals: true,
    // Keep per-stage debug and info lines out of test output
    env: {
      LOG_LEVEL: 'warn',
    },
  },
});
