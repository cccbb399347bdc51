import { defineConfig } from 'vitest/config'

const workspace = (name: string) =>
  new URL(`./packages/${name}/src/index.ts`, import.meta.url).pathname

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      reporter: ['text', 'json', 'html'],
    },
  },
  resolve: {
    alias: {
      '@sketchloop/system': workspace('system'),
      '@sketchloop/canvas': workspace('canvas'),
      '@sketchloop/runtime': workspace('runtime'),
    },
  },
})
