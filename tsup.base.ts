import type { Options } from 'tsup';

/**
 * Build options shared by the library packages
 */
export const libraryBuild: Options = {
  entry: ['src/index.ts'],
  format: ['cjs', 'esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  tsconfig: '../../tsconfig.json',
};
