import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['smoke/**/*.test.ts'],
    testTimeout: 10000,
  },
});
