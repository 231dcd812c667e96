import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    exclude: [
      'node_modules',
      '.codeloop',
      'dist',
    ],
    include: ['test/**/*.test.ts'],
  },
});
