import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts', 'api/src/**/*.test.ts'],
    environment: 'node',
    env: {
      LITELLM_API_KEY: 'test-key',
      SQLITE_PATH: './data/test/drill.db',
    },
    restoreMocks: false,
  },
});
