import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'tools/*/src/**/*.test.ts'],
    // relay tests bind fixed localhost ports
    fileParallelism: false,
    testTimeout: 10000,
  },
});
