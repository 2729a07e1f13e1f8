import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'lexer',
    globals: false,
    environment: 'node',
    include: ['test/**/*.test.ts'],
  },
});
