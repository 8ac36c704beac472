import { defineConfig } from 'vitest/config';

export default defineConfig({
  define: {
    __DEBUG_BUILD__: true,
  },
  test: {
    include: ['sdk/*/test/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
  },
});
