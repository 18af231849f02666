import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

// Workspace packages export their built output; tests run against the sources.
export default defineConfig({
  resolve: {
    alias: {
      shared: fileURLToPath(new URL('./packages/shared/src/index.ts', import.meta.url)),
      recordkit: fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
  },
})
