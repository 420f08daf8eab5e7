import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/tests/**/*.test.ts'],
    environment: 'node',
    env: {
      RECON_BOOTSTRAP_LOG_LEVEL: 'silent',
    },
  },
});
