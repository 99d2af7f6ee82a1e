import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['openstack-swift/typescript/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
