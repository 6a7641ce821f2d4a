import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // chalk picks its color level when it is first imported
    env: {
      FORCE_COLOR: '0',
    },
  },
});
