import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    testTimeout: 30000,
    hookTimeout: 30000,
    env: {
      // Prevent tests from ever defaulting to the real data dir
      NODE_ENV: 'test',
    },
  },
})
