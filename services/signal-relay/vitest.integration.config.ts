import { defineConfig } from 'vitest/config';
export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/integration/**/*.test.ts'],
    reporters: ['default'],
    env: { LOG_LEVEL: 'silent' },
    hookTimeout: 10000
  }
});
