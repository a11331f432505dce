import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/lib.ts'],
  format: ['esm'],
  dts: { entry: 'src/lib.ts' },
  clean: true,
  sourcemap: true,
  target: 'node20',
  outDir: 'dist',
  splitting: true,
  external: [
    // Dependencies stay external for the CLI and the library
    'chalk',
    'commander',
    'fast-glob',
    'openai',
    'strip-ansi',
    'yaml',
    'zod'
  ]
});
