import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/*/src/**/*.test.ts'],
    testTimeout: 20_000,
    watch: false,
  },
});
