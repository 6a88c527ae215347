import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    // First use of the ledger serialisation library loads its WASM/crypto backends
    testTimeout: 20_000
  }
})
