import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['orchestrator/test/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
      MOCK_MODE: 'true'
    }
  }
});
