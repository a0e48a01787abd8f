import { defineConfig } from 'vitest/config';
import { loadEnv } from 'vite';

export default defineConfig(({ mode }) => ({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    testTimeout: 30000,
    env: {
      ...loadEnv(mode, process.cwd(), ''),
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      DATABASE_URL: 'sqlite::memory:',
      NODE_ID: 'validator_test',
      ADMIN_PASSWORD: 'test-secret',
      AUTHORITY_VALIDATION_URL: 'http://authority.test/validate',
    },
  },
}));
