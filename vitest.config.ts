import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    reporters: ['default'],
    env: {
      LOG_LEVEL: 'error',
      LOG_TO_FILE: 'false',
    },
  },
});
