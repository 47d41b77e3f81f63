import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/fuzz/setup.ts'],
    watch: false,
    // Property tests seed a fresh station per run
    testTimeout: 30000,
    hookTimeout: 10000,
  },
})
