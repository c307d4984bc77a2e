import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    // Read by config.ts at import time, before any test file runs.
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
