import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['lib/**/*.test.ts', 'routes/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    // scheduler tests wait on real timers
    testTimeout: 10000,
  },
});
