import { defineConfig } from 'vitest/config';
import { cpus } from 'os';

const cpuCount = cpus().length;
const isCI = process.env.CI === 'true';

// CI: 2 workers. Local: half the cores, at most 4.
const maxForks = isCI ? 2 : Math.min(4, Math.max(1, Math.floor(cpuCount / 2)));

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],

    testTimeout: 30000,
    hookTimeout: 10000,

    pool: 'forks',
    poolOptions: {
      forks: { maxForks, minForks: 1 },
    },
    isolate: true,

    environment: 'node',
    setupFiles: ['./tests/vitest.setup.ts'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts'],
      thresholds: {
        statements: 80,
        branches: 80,
        functions: 80,
        lines: 80,
      },
    },
  },
});
