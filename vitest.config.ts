import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['ts-sync-openapi/src/**/__tests__/*.test.ts'],
  },
});
