import { fileURLToPath } from 'url';
import { defineConfig, configDefaults } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@\//, replacement: fileURLToPath(new URL('./packages/engine/src/', import.meta.url)) },
      { find: '@memokit/types', replacement: fileURLToPath(new URL('./packages/types/src/index.ts', import.meta.url)) },
    ],
  },
  test: {
    watch: false,
    include: ['packages/*/test/**/*.{spec,test}.ts'],
    exclude: [...configDefaults.exclude],
    env: {
      LOG_LEVEL: 'error',
    },
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**'],
    },
  },
});
