import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    env: {
      SAPI_LOG_LEVEL: 'silent',
    },
  },
});
