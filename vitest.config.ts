import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 15000,
    env: {
      NODE_ENV: 'test',
      LOG_SILENT: 'true',
    },
  },
});
