import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/test/**/*.test.ts'],
    restoreMocks: true,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
