import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts', 'qseqc.test.ts'],
    testTimeout: 60_000,
    pool: 'forks',
  },
})
