import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    testTimeout: 10_000,
    // Load CommonJS dependencies the way Node's ESM loader does
    deps: {
      interopDefault: false,
    },
  },
});
