import { defineConfig } from 'tsup';

export default defineConfig((options) => ({
  entry: ['src/index.ts'],
  format: ['cjs', 'esm'],
  dts: options.watch ? false : {
    resolve: true,
  },
  splitting: false,
  sourcemap: true,
  clean: true,
  treeshake: true,
  external: [
    '@solana/addresses',
    '@solana/codecs',
    '@solana/codecs-strings',
    '@solana/errors',
    '@solana/instructions',
    '@solwire/tx-errors',
  ],
}));
