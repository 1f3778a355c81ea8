import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
    // Fake timers are installed per-suite; restore them even when a test throws
    restoreMocks: true,
  },
});
