import { defineConfig } from 'vitest/config'
import path from 'path'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@crewbook/domain': path.resolve(__dirname, '../domain/src/index.ts'),
    },
  },
})
