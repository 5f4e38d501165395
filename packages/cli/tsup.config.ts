import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/cli.ts'],
  format: ['esm'],
  dts: false,
  clean: true,
  sourcemap: true,
  target: 'node20',
  // Workspace packages ship TypeScript sources, so they are bundled in
  noExternal: ['@hubanon/activity', '@hubanon/privacy'],
});
