import resolve from '@rollup/plugin-node-resolve';
import commonjs from '@rollup/plugin-commonjs';
import typescript from '@rollup/plugin-typescript';
import { defineConfig } from 'rollup';

export default defineConfig({
  input: 'src/index.ts',
  output: [
    {
      file: 'dist/index.js',
      format: 'esm',
      sourcemap: true,
    },
  ],
  external: [/^node:/, 'zod', 'zustand', /^zustand\//, 'react'],
  plugins: [
    resolve({
      extensions: ['.mjs', '.js', '.json', '.ts'],
    }),
    commonjs(),
    typescript({
      tsconfig: './tsconfig.json',
      noEmit: false,
      declaration: false,
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts', 'src/test.setup.ts', 'src/test.fixtures.ts'],
    }),
  ],
});
