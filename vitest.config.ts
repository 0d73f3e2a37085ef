import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    // Keep debug logging quiet regardless of the developer's shell.
    env: {
      CLOZE_DRILL_DEBUG: 'false',
      NODE_ENV: 'test',
    },
  },
});
