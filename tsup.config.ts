import { defineConfig } from 'tsup';
import { readFileSync } from 'fs';

const { version } = JSON.parse(readFileSync('./package.json', 'utf-8')) as { version: string };

export default defineConfig([
  {
    entry: ['src/index.ts'],
    format: ['cjs', 'esm'],
    dts: true,
    sourcemap: false,
    clean: true,
    outDir: 'dist',
    define: {
      '__SQLSCRUB_VERSION__': JSON.stringify(version),
    },
  },
  {
    entry: ['src/bin.ts'],
    format: ['cjs'],
    sourcemap: false,
    shims: true,
    outDir: 'dist',
    banner: {
      js: '#!/usr/bin/env node',
    },
    define: {
      '__SQLSCRUB_VERSION__': JSON.stringify(version),
    },
  },
]);
