import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  treeshake: true,
  platform: 'browser',
  noExternal: ['@ttp-events/client'],
  external: ['@ttp-events/proto', 'zod'],
});
