import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // koffi and tree-sitter are native add-ons; load them in child processes
    // rather than worker threads.
    pool: 'forks',
  },
});
