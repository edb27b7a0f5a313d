import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['contracts/tests/**/*.test.ts', 'inventory/tests/**/*.test.ts', 'shell/tests/**/*.test.ts'],
    environment: 'node',
  },
});
