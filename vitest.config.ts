import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'

const source = (path: string): string => fileURLToPath(new URL(path, import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@routeconf/router': source('./packages/router/src/index.ts'),
      '@routeconf/server': source('./packages/server/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
  },
})
