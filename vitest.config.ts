import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    // Quiet the pipeline's progress lines during test runs.
    env: { LOG_LEVEL: 'error' },
  },
});
