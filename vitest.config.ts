import { defineConfig } from 'vitest/config'

/**
 * Root config so `npm test` runs every workspace's tests in one pass.
 * Each package keeps its own vitest.config.ts for running it alone.
 */
export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    env: {
      MODORDER_LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/index.ts'],
    },
  },
})
