import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  splitting: false,
  dts: true,
  sourcemap: false,
  clean: true,
  minify: false,
  outExtension: () => ({
    js: '.js',
  }),
});
