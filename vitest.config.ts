import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    clearMocks: true,
    // Steps shell out only through FakeExecutor; nothing here should be slow
    testTimeout: 10_000,
  },
});
