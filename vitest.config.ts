import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    // Integration tests share REPOLOCK_HOME through process.env
    fileParallelism: false,
  },
});
