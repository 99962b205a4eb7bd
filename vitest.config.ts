import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'

const source = (path: string) => fileURLToPath(new URL(path, import.meta.url))

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    setupFiles: ['./test/setup.ts'],
    env: { LOG_LEVEL: 'silent' },
    alias: [
      { find: /^sethub\/config$/, replacement: source('./src/config.ts') },
      { find: /^sethub\/fastify$/, replacement: source('./src/fastify/index.ts') },
      { find: /^sethub$/, replacement: source('./src/index.ts') },
    ],
  },
})
