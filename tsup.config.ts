import { defineConfig } from 'tsup';

export default defineConfig([
  {
    entry: ['src/index.ts'],
    format: ['cjs', 'esm'],
    outDir: 'dist',
    clean: true,
    // Generate declaration file
    dts: true,
    sourcemap: true,
  },
  {
    // The shebang in src/cli.ts is kept by esbuild
    entry: ['src/cli.ts'],
    format: ['cjs'],
    outDir: 'dist',
    clean: false,
    bundle: true,
    platform: 'node',
    target: 'node20',
    external: ['cli-progress', 'glob', 'strip-json-comments', 'yargs'],
  },
]);
