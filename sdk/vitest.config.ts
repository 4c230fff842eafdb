import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // Registry transactions log at debug/warn; keep test output to the reporter
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
