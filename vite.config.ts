import { defineConfig } from 'vite';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import dts from 'vite-plugin-dts';
import type { Plugin } from 'vite';

const root = fileURLToPath(new URL('.', import.meta.url));

/**
 * Rollup plugin to make sure the CLI chunk starts with a shebang line.
 */
function shebangPlugin(): Plugin {
  return {
    name: 'shebang',
    generateBundle(_options, bundle) {
      for (const [fileName, chunk] of Object.entries(bundle)) {
        if (fileName.includes('bytesniff.cli') && chunk.type === 'chunk' && !chunk.code.startsWith('#!')) {
          chunk.code = '#!/usr/bin/env node\n' + chunk.code;
        }
      }
    },
  };
}

export default defineConfig({
  plugins: [
    dts({
      include: ['src/**/*'],
    }),
    shebangPlugin(),
  ],
  build: {
    outDir: 'bundle',
    lib: {
      entry: {
        bytesniff: resolve(root, 'src/index.ts'),
        'bytesniff.node': resolve(root, 'src/node.ts'),
        'bytesniff.stream': resolve(root, 'src/node-stream.ts'),
        'bytesniff.cli': resolve(root, 'src/cli.ts'),
      },
      // ESM only: the CLI locates package.json through import.meta.url
      formats: ['es'],
      fileName: (_format, entryName) => `${entryName}.js`,
    },
    rollupOptions: {
      external: ['node:fs', 'node:fs/promises', 'node:path', 'node:stream', 'node:url'],
      output: {
        preserveModules: false,
        exports: 'named',
      },
    },
    sourcemap: true,
    minify: 'esbuild',
    target: 'es2022',
  },
});
