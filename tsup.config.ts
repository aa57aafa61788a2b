import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    cli: 'src/cli/index.ts',
  },
  // hyparquet and hyparquet-writer ship ESM only
  format: ['esm'],
  dts: true,
  splitting: false,
  sourcemap: true,
  clean: true,
  target: 'node20',
  outDir: 'dist',
  esbuildOptions(options, context) {
    if (context.format === 'esm') {
      options.banner = {
        js: '#!/usr/bin/env node',
      };
    }
  },
});
