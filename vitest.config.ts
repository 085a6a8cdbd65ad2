import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['services/*/tests/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      include: ['services/exporter/src/**'],
    },
  },
});
