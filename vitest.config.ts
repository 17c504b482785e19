import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      ROUTER_LOG_LEVEL: 'silent',
    },
    restoreMocks: true,
  },
});
