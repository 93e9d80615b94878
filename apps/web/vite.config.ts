import path from 'node:path';

import { defineConfig } from 'vite';

export default defineConfig({
  base: './',
  resolve: {
    // Prefer TS sources over accidental stale JS artifacts inside package src folders.
    extensions: ['.ts', '.tsx', '.js', '.jsx', '.mjs', '.json'],
    alias: {
      '@chip8asm/lang-chip8': path.resolve(__dirname, '../../packages/lang-chip8/src/index.ts')
    }
  },
  build: {
    target: 'es2022'
  }
});
