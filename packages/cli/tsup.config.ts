import { defineConfig } from 'tsup'

export default defineConfig({
  entry: ['src/bin.ts'],
  format: ['esm'],
  sourcemap: true,
  clean: true,
  // the library's package exports point at its sources, so bundle it in
  noExternal: ['binpin'],
})
