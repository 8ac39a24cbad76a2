import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['*/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20_000,
    // Sandbox tests spawn real interpreters and read process-wide env config
    fileParallelism: false,
  },
});
