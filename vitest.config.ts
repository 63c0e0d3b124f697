import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    env: {
      POKEDEX_LOG_LEVEL: 'warn',
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
})
