import { defineConfig } from 'vitest/config';

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'packages/*/src/**/__tests__/**/*.test.ts',
      'packages/*/test/**/*.spec.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // No retries: concurrency regressions must surface on first run.
    retry: 0,
    fileParallelism: !isCI,
    testTimeout: isCI ? 30000 : 10000,
    reporters: ['default'],
    env: {
      NODE_ENV: 'test',
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
