import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['rules-engine/test/**/*.test.ts'],
  },
});
