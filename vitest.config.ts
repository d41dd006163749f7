import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    restoreMocks: true,
    clearMocks: true,
    env: {
      NODE_ENV: 'test',
      JWT_SECRET: 'test-secret',
    },
  },
});
