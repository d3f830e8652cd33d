import { defineConfig } from 'tsup';

export default defineConfig([
  {
    entry: ['src/index.ts'],
    format: ['cjs', 'esm'],
    dts: true,
    splitting: false,
    sourcemap: true,
    minify: false,
  },
  {
    // The CLI reads package.json through import.meta.url, so ESM only
    entry: ['src/bin.ts'],
    format: ['esm'],
    splitting: false,
    sourcemap: true,
    minify: false,
  },
]);
