import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['inventory-service/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
