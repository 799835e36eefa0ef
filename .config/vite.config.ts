import { defineConfig } from 'vite';
import { fileURLToPath } from 'node:url';

const fromRoot = (path: string): string => fileURLToPath(new URL(`../${path}`, import.meta.url));

// Library build: one ES module per source file under dist/
export default defineConfig({
  build: {
    lib: {
      entry: fromRoot('src/index.ts'),
      name: 'RecordSieve',
      formats: ['es'],
    },
    outDir: fromRoot('dist'),
    emptyOutDir: true,
    minify: false,
    sourcemap: true,
    rollupOptions: {
      output: {
        preserveModules: true,
        preserveModulesRoot: fromRoot('src'),
        entryFileNames: '[name].js',
      },
    },
  },
});
