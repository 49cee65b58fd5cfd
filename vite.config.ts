/// <reference types="vitest/config" />
import { defineConfig } from 'vite';

export default defineConfig({
  test: {
    hookTimeout: 30_000,
    testTimeout: 30_000,
    globals: true,
    setupFiles: ['./tests/fixtures/vitest.setup.ts'],
  },
});
