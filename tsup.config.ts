import { defineConfig } from 'tsup'

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    policy: 'src/policy/index.ts',
    headers: 'src/middleware/headers/index.ts',
    report: 'src/middleware/report/index.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  splitting: false,
  treeshake: true,
  minify: false,
  external: ['next', 'zod'],
  esbuildOptions(options) {
    options.platform = 'neutral' // Edge Runtime compatible
  },
})
