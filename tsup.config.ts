import { defineConfig } from 'tsup';

export default defineConfig({
  entry: { index: 'src/index.ts' },
  format: ['esm', 'cjs'],
  platform: 'node',
  dts: true,
  clean: true,
  minify: false,
  sourcemap: false,
  treeshake: true,
  splitting: false,
  target: 'node20',
});
