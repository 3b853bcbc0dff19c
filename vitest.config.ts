import { defineConfig } from 'vitest/config';

// One run covers every workspace: packages/* and apps/*.
export default defineConfig({
  test: {
    include: [
      'packages/*/src/**/*.{test,spec}.ts',
      'apps/*/src/**/*.{test,spec}.ts',
    ],
    exclude: ['**/dist/**', '**/node_modules/**'],
    environment: 'node',
    globals: true, // describe/it/expect/vi without imports
    reporters: ['default'],
    coverage: {
      enabled: false,
      provider: 'v8',
      reporter: ['text', 'lcov'],
    },
  },
});
