import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
  splitting: false,
  sourcemap: false,
  dts: false,
  // The core workspace package ships TypeScript sources, so it is bundled in.
  noExternal: ['@parley/core'],
  external: [
    'ai',
    '@ai-sdk/openai',
    'chalk',
    'commander',
    'ink',
    'ink-spinner',
    'ink-text-input',
    'marked',
    'marked-terminal',
    'pino',
    'react',
    'yaml',
    'zod',
  ],
  esbuildOptions(options) {
    options.jsx = 'automatic';
  },
});
