import { defineConfig, defineProject } from 'vitest/config';

export default defineConfig({
  test: {
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/*.d.ts', '**/dist/**', '**/__test__/**'],
    },
    // In-page helpers need a DOM; the driver only ever talks to a protocol client.
    projects: [
      defineProject({
        test: {
          name: 'dom',
          globals: true,
          environment: 'happy-dom',
          include: ['packages/core/src/**/*.test.ts'],
          exclude: ['**/node_modules/**', '**/dist/**'],
        },
      }),
      defineProject({
        test: {
          name: 'node',
          globals: true,
          environment: 'node',
          include: ['packages/driver/src/**/*.test.ts'],
          exclude: ['**/node_modules/**', '**/dist/**'],
        },
      }),
    ],
  },
});
