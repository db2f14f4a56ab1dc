import { defineConfig } from 'vitest/config';
export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/unit/**/*.test.ts'],
    reporters: ['default'],
    env: { LOG_LEVEL: 'silent' },
    coverage: { reporter: ['text', 'lcov'] }
  }
});
