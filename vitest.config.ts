import { defineConfig } from 'vitest/config';

process.env.LOG_LEVEL ??= 'silent';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    // bcrypt at low cost still takes a few hundred ms per hash on slow runners
    testTimeout: 15000,
  },
});
