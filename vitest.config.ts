import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['services/*/test/**/*.spec.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
      BOTWORKER_LISTEN_TIMEOUT_S: '0.05',
    },
  },
});
