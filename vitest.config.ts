import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'sql-grammar-transducer',
    environment: 'node',
    include: ['source/__tests__/**/*.test.ts'],
  },
})
