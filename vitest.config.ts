import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const packageSource = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@keelson/types': packageSource('types'),
      '@keelson/core': packageSource('core'),
      '@keelson/codec': packageSource('codec'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
  },
})
