import { defineConfig } from 'tsup'
import type { Options } from 'tsup'

export const options: Options = {
  entry: ['src/bin.ts'],
  format: ['esm'],
  outDir: 'dist',
  sourcemap: true,
  clean: true,
  // Bundled in, so the bin runs without a build of devpatch.
  noExternal: ['devpatch'],
  esbuildOptions(esbuild) {
    esbuild.conditions = ['source']
  },
  banner: {
    js: '#!/usr/bin/env node',
  },
}

export default defineConfig(options)
