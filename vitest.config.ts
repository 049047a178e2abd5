import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['src/**/*.{test,spec}.ts'],

    coverage: {
      provider: 'v8',
      include: ['src/**/*'],
      exclude: ['node_modules', 'dist', 'coverage', 'src/test/**'],
      reporter: ['text', 'html'],
    },
  },
});
