import { defineConfig } from 'vite';
import dts from 'vite-plugin-dts';
import { fileURLToPath } from 'node:url';

const banner = `/*!
 * sluice
 * (c) ${new Date().getFullYear()}
 * Released under the MIT License
 */
`;

export default defineConfig({
  plugins: [
    dts({
      insertTypesEntry: true,
      tsconfigPath: './tsconfig.build.json',
      rollupTypes: true,
      outDir: "dist/types",
    }),
  ],
  build: {
    lib: {
      entry: fileURLToPath(new URL('./mod.ts', import.meta.url)),
      name: 'sluice',
      fileName: (format) => format === 'es' ? 'index.js' : `index.${format}.js`,
      formats: ['es', 'umd'],
    },
    sourcemap: false,
    rollupOptions: {
      output: {
        exports: "named",
        banner,
      },
    },
  }
});
