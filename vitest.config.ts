import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // config tests change the working directory, which worker threads forbid
    pool: 'forks',
    testTimeout: 10000,
    restoreMocks: true,
  },
});
