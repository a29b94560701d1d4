import { defineConfig } from 'tsup';
import { readFileSync } from 'fs';

const pkg: unknown = JSON.parse(readFileSync('./package.json', 'utf-8'));
const version =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0-dev';
const isProduction = process.env.NODE_ENV === 'production';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  sourcemap: !isProduction,
  clean: true,
  splitting: false,
  treeshake: true,
  outDir: 'dist',
  target: 'node20',
  // Bundle the workspace core package; it ships TypeScript sources only
  noExternal: ['@minorbuild/core'],
  minify: isProduction,
  // Bundled core resolves its data files relative to dist/
  onSuccess: 'mkdir -p data && cp ../core/data/*.json data/',
  define: {
    'process.env.CLI_VERSION': JSON.stringify(version),
  },
});
