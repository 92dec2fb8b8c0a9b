import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['activity-telemetry/tests/**/*.test.ts'],
    environment: 'node',
  },
});
