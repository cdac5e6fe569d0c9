import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

// Sun times are re-anchored in the local calendar; pin it for every worker
process.env.TZ = 'UTC'

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url))
    }
  },
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/setup.ts'],
    watch: false,
    testTimeout: 30000
  }
})
