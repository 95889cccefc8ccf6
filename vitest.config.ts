import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // keep per-chunk progress lines out of the test output
    env: {
      LOG_LEVEL: 'error',
    },
  },
})
