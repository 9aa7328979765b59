import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'pql-tools',
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
  },
});
