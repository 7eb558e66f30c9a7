import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['bot/src/**/*.test.ts', 'api/src/**/*.test.ts'],
    reporters: ['default'],
  },
})
