import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // one test file per process, so descriptor counts are not shared
    pool: 'forks',
  },
});
