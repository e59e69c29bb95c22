import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: false,
  clean: true,
  target: 'node20',
  platform: 'node',
  treeshake: true,
  splitting: false,
  sourcemap: true,
  minify: false,
  // Workspace packages export .ts sources and must be inlined
  noExternal: [/^@envguard\//],
});
