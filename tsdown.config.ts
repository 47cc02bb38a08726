import { defineConfig } from 'tsdown';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm', 'cjs'],
  dts: true,
  clean: true,
  outDir: 'dist',
  platform: 'node',
  treeshake: true,
  sourcemap: true,
  fixedExtension: true,
  // runtime dependencies stay imports; fs-ext carries a native binding
  external: ['cbor-x', 'fs-ext', 'pino', 'zod'],
});
