import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
    },
    include: [
      'packages/*/src/**/__tests__/*.test.ts',
      'apps/*/src/**/__tests__/*.test.ts',
    ],
  },
});
