import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,

    projects: [
      {
        extends: './vite.config.ts',
        test: {
          name: 'node',
          environment: 'node',
          globals: true,
          include: ['tests/**/*.test.ts'],
        },
      },
    ],
  },
});
