import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['core/**/*.test.ts', 'agents/**/*.test.ts'],
    testTimeout: 10000,
  },
});
