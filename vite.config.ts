import { defineConfig } from 'vite';
import { fileURLToPath } from 'node:url';

const srcPath = (file: string): string => fileURLToPath(new URL(`./src/${file}`, import.meta.url));

export default defineConfig({
  build: {
    target: 'node20',
    outDir: 'dist',
    minify: false,
    lib: {
      entry: {
        index: srcPath('index.ts'),
        cli: srcPath('cli.ts'),
      },
      formats: ['es'],
      fileName: (_format, entryName) => `${entryName}.js`,
    },
    rollupOptions: {
      external: [/^node:/, 'unified', 'remark-parse', 'remark-gfm', 'unist-util-visit'],
    },
  },
});
