import { defineConfig } from 'vite';
import { fileURLToPath } from 'node:url';
import dts from 'vite-plugin-dts';
import type { Plugin } from 'vite';

const entry = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

/**
 * Rollup plugin to prepend a shebang line to the CLI chunk.
 */
function shebangPlugin(): Plugin {
  return {
    name: 'shebang',
    generateBundle(_options, bundle) {
      for (const [fileName, chunk] of Object.entries(bundle)) {
        if (fileName.startsWith('pdf-image-carve.bin') && chunk.type === 'chunk' && !chunk.code.startsWith('#!')) {
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
    outDir: 'dist/bundle',
    lib: {
      entry: {
        'pdf-image-carve': entry('./src/index.ts'),
        'pdf-image-carve.node': entry('./src/node.ts'),
        'pdf-image-carve.bin': entry('./src/bin.ts'),
      },
      formats: ['es', 'cjs'],
      fileName: (format, entryName) => {
        const ext = format === 'es' ? 'js' : 'cjs';
        return `${entryName}.${ext}`;
      },
    },
    rollupOptions: {
      external: [
        'node:fs',
        'node:fs/promises',
        'node:path',
        'node:url',
      ],
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
