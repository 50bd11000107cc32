import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  resolve: {
    // Tests run against the workspace sources, not the built dist.
    alias: [{ find: /^devpatch$/, replacement: fileURLToPath(new URL('./packages/devpatch/src/index.ts', import.meta.url)) }],
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20000,
  },
})
