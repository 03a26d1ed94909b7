import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['gaugeline/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
