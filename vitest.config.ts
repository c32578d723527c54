import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Test source files directly, not compiled dist/
    include: ['src/**/*.test.ts'],
    // Console only while testing
    env: {
      AGENT_CORE_LOG_DIR: '',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
    },
  },
});
