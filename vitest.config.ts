import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    // Deterministic test ordering
    sequence: {
      shuffle: false,
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
