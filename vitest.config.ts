import { defineConfig } from 'vitest/config';

/** Vitest configuration shared by `npm test` and the category runner. */
export default defineConfig({
  test: {
    include: ['src/**/*.test.ts', 'host/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true
  }
});
