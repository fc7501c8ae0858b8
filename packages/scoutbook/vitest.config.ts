import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'scoutbook',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 5_000,
    pool: 'forks',
    environment: 'node',
    retry: 0,
  },
});
