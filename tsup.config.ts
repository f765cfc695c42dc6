import { defineConfig, type Options } from 'tsup'

// Sources import the LTC table as JSON; esbuild inlines it into every bundle.
const shared: Options = {
  outDir: 'dist',
  splitting: false,
  target: 'node20',
  platform: 'node',
}

export default defineConfig([
  {
    ...shared,
    entry: { index: 'src/index.ts' },
    format: ['esm', 'cjs'],
    dts: true,
    clean: true,
    sourcemap: true,
    outExtension: ({ format }) => ({ js: format === 'esm' ? '.mjs' : '.cjs' }),
  },
  // deepsky-calc is run through the `bin` entry, so it needs the shebang
  {
    ...shared,
    entry: { 'cli/index': 'src/cli/index.ts' },
    format: ['cjs'],
    banner: { js: '#!/usr/bin/env node' },
    outExtension: () => ({ js: '.cjs' }),
  },
])
