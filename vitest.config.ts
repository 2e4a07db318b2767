import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['core/**/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000
  }
});
