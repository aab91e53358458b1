import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '.git'],
    setupFiles: ['src/test-setup.ts'],
    testTimeout: 10_000,
    teardownTimeout: 5_000,
  },
});
