import { defineConfig } from 'tsup';

// index.ts carries its own shebang; tsup keeps it and marks the file executable
export default defineConfig({
  entry: ['src/index.ts', 'src/program.ts'],
  format: ['esm'],
  sourcemap: true,
  clean: true,
  splitting: false,
  treeshake: true,
  outDir: 'dist',
  target: 'node20',
});
