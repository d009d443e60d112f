import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'tests/**/*.test.ts'],
    environment: 'node',
    env: {
      SCRATCHPAY_LOG_LEVEL: 'silent',
    },
  },
});
