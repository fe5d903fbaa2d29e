import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['fixed-math/tests/**/*.test.ts', 'fixed-codec/tests/**/*.test.ts'],
  },
});
