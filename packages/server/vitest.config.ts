/**
 * Vitest Configuration for Server Package
 *
 * - Node.js environment; HTTP is exercised in-process through supertest
 * - Upstream libraries (youtube-transcript, node-fetch) are mocked per test file
 * - Coverage over the service code, tests excluded
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Test environment - Node.js for server-side testing
    environment: 'node',

    // Test file patterns
    include: [
      'lib/**/*.test.ts',
      'config/**/*.test.ts',
      'middleware/**/*.test.ts',
      'routes/**/*.test.ts'
    ],

    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/coverage/**'
    ],

    setupFiles: ['./tests/setupTests.ts'],

    testTimeout: 10000,
    hookTimeout: 10000,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'lcov'],
      reportsDirectory: './coverage',
      include: [
        'app.ts',
        'config/**/*.ts',
        'lib/**/*.ts',
        'middleware/**/*.ts',
        'routes/**/*.ts'
      ],
      exclude: [
        '**/*.test.ts',
        '**/__tests__/**'
      ]
    },

    // Environment variables for testing
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'error' // Suppress logs during testing
    },

    watch: false,
    isolate: true
  }
})
