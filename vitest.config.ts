import { fileURLToPath } from 'node:url'
import { configDefaults, defineConfig } from 'vitest/config'

const notebookDir = fileURLToPath(new URL('./apps/notebook', import.meta.url))

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/**/*.test.ts', 'packages/**/*.test.ts'],
    exclude: [...configDefaults.exclude, '**/node_modules/**', '**/dist/**'],
    setupFiles: ['./apps/notebook/vitest.setup.ts'],
    testTimeout: 15000,
    hookTimeout: 15000,
  },
  resolve: {
    alias: [{ find: /^@\//, replacement: `${notebookDir}/` }],
  },
})
