import { defineConfig } from 'vitest/config';
import path from 'node:path';

export default defineConfig({
  resolve: {
    extensions: ['.ts', '.tsx', '.js', '.jsx', '.mjs', '.json'],
    alias: {
      '@chip8asm/lang-chip8': path.resolve(__dirname, '../../packages/lang-chip8/src/index.ts')
    }
  },
  test: {
    include: ['src/**/*.test.ts']
  }
});
