import { defineConfig } from 'vitest/config';

// Timestamps render in local time; pin the zone so expectations are stable.
process.env.TZ = 'UTC';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    env: {
      TZ: 'UTC',
    },
  },
});
