import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['api/**/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['api/__tests__/helpers/setup.ts'],
    testTimeout: 20000,
    env: {
      LOG_LEVEL: 'error',
    },
  },
})
