/// <reference types="vitest" />
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node', // shared code is types and pure helpers
    include: ['src/**/*.test.ts'],
  },
});
