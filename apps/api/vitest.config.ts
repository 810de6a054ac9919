import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.{test,spec}.ts', 'src/**/*.{test,spec}.ts'],
    environment: 'node',
    globals: false,
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'error',
      JWT_SECRET: 'test-secret-that-is-at-least-32-characters',
    },
  },
});
