import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.spec.ts'],
    env: {
      FACTORY_LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      exclude: ['**/dist/**', '**/node_modules/**', '**/*.d.ts'],
      include: ['packages/*/src/**/*.ts'],
      thresholds: {
        functions: 85,
        lines: 77,
        branches: 85,
      },
    },
  },
});
