import { configDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/__tests__/**/*.test.ts'],
    // node:test suites that run against the compiled output
    exclude: [...configDefaults.exclude, 'src/__tests__/**/*.node.test.ts'],
    environment: 'node',
    testTimeout: 15000,
  },
});
