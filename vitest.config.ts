import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    // MODP2048 exponentiations run in pure bigint arithmetic
    testTimeout: 30_000,
  },
});
