import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Single entry point: policy, retrier, errors and Result primitives
    index: 'src/index.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
  target: 'node20',
});
