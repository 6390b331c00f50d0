import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['similar-folders/src/**/*.test.ts'],
    environment: 'node'
  }
});
