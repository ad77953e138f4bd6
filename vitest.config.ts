import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

/**
 * Workspace test configuration.
 *
 * Every package under packages/ is a vitest project with its own config;
 * runs are deterministic (no retries, default reporter) and never watch.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: 'node',
    projects: ['packages/*'],
    retry: 0,
    fileParallelism: !isCI,
    // Shrinking and property tests run many executions
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,
    env: {
      NODE_ENV: 'test',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
