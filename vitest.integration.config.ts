import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.int.{test,spec}.ts'], // Only include integration tests
    pool: 'forks', // Use forks pool for isolation
    maxConcurrency: 1, // Run tests sequentially
    poolOptions: {
      forks: { singleFork: true },
    },
  },
});
