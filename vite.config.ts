import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'
import dts from 'vite-plugin-dts'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.spec.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['html', 'text-summary'],
      include: ['src/**/*.ts'],
    },
  },
  plugins: [
    dts({
      tsconfigPath: './tsconfig.build.json',
      insertTypesEntry: true,
    }),
  ],
  build: {
    lib: {
      entry: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
      name: 'fletch',
      formats: ['es', 'cjs'],
      fileName: (format) => `${format}/index.js`,
    },
    outDir: 'dist/bundle',
    rollupOptions: {
      output: {
        preserveModules: false,
      },
      external: [
        'node:http',
        'node:stream',
      ],
    },
    sourcemap: true,
    emptyOutDir: true,
  },
});
